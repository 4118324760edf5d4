import { Test, TestingModule } from '@nestjs/testing';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { testDatabaseImports } from '../../testing/test-database';
import { ContactService } from './contact.service';
import { CreateContactMessageDto } from './dto/create-contact-message.dto';

describe('CreateContactMessageDto', () => {
  const valid = {
    name: 'Dana',
    email: 'dana@example.com',
    topic: 'Pricing',
    message: 'Is there a yearly plan?',
  };

  it('accepts a complete message', async () => {
    expect(await validate(plainToInstance(CreateContactMessageDto, valid))).toEqual([]);
  });

  it('rejects a malformed email', async () => {
    const errors = await validate(plainToInstance(CreateContactMessageDto, { ...valid, email: 'dana' }));

    expect(errors.map((error) => error.property)).toEqual(['email']);
  });

  it('rejects an empty message', async () => {
    const errors = await validate(plainToInstance(CreateContactMessageDto, { ...valid, message: '' }));

    expect(errors.map((error) => error.property)).toEqual(['message']);
  });
});

describe('ContactService', () => {
  let moduleRef: TestingModule;
  let service: ContactService;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [...testDatabaseImports()],
      providers: [ContactService],
    }).compile();
    service = moduleRef.get(ContactService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('stores trimmed messages with a lower-cased email', async () => {
    const stored = await service.submit({
      name: ' Dana ',
      email: 'Dana@Example.com',
      topic: 'Pricing',
      message: 'Hello ',
    });

    expect(stored).toMatchObject({ name: 'Dana', email: 'dana@example.com', message: 'Hello' });
    expect(await service.list()).toHaveLength(1);
  });
});
