import {
  ConflictException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { randomBytes } from 'node:crypto';
import { DataSource, EntityManager, LessThan, Repository } from 'typeorm';
import { EnvConfig } from '../../config/env.validation';
import { AuthSession } from '../../entities/auth-session.entity';
import { User } from '../../entities/user.entity';
import { SubscriptionPlan, UserProfile } from '../../entities/user-profile.entity';
import { LoginDto, SignupDto } from './dto/credentials.dto';
import { hashPassword, verifyPassword } from './password';
import { SessionGrant } from './auth.types';

const HOUR_MS = 60 * 60 * 1000;

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    @InjectRepository(User) private readonly userRepository: Repository<User>,
    @InjectRepository(AuthSession) private readonly sessionRepository: Repository<AuthSession>,
    private readonly configService: ConfigService<EnvConfig, true>,
  ) {}

  /**
   * Creates the user and its free-plan profile together, then signs them in.
   */
  async signup(dto: SignupDto): Promise<SessionGrant> {
    const passwordHash = await hashPassword(dto.password);

    const user = await this.dataSource.transaction(async (manager) => {
      const users = manager.getRepository(User);
      if ((await users.countBy({ username: dto.username })) > 0) {
        throw new ConflictException(`Username ${dto.username} is already taken`);
      }

      const created = await users.save(users.create({ username: dto.username, passwordHash }));
      await manager.getRepository(UserProfile).save(
        manager.getRepository(UserProfile).create({
          userId: created.id,
          subscriptionPlan: SubscriptionPlan.FREE,
        }),
      );
      return created;
    });

    this.logger.log(`User ${user.username} signed up`);
    return this.issueSession(user);
  }

  async login(dto: LoginDto): Promise<SessionGrant> {
    const user = await this.userRepository.findOne({
      where: { username: dto.username },
      select: { id: true, username: true, passwordHash: true, createdAt: true },
    });

    if (!user || !(await verifyPassword(dto.password, user.passwordHash))) {
      throw new UnauthorizedException('Invalid username or password');
    }

    return this.issueSession(user);
  }

  async logout(token: string): Promise<void> {
    await this.sessionRepository.delete({ token });
  }

  /**
   * The session's user, or null for an unknown or expired token. Expired
   * sessions are removed on sight.
   */
  async authenticate(token: string): Promise<User | null> {
    const session = await this.sessionRepository.findOne({
      where: { token },
      relations: { user: true },
    });
    if (!session) return null;

    if (session.expiresAt.getTime() <= Date.now()) {
      await this.sessionRepository.delete({ id: session.id });
      return null;
    }
    return session.user ?? null;
  }

  async purgeExpiredSessions(manager?: EntityManager): Promise<number> {
    const repository = manager ? manager.getRepository(AuthSession) : this.sessionRepository;
    const result = await repository.delete({ expiresAt: LessThan(new Date()) });
    return result.affected ?? 0;
  }

  private async issueSession(user: User): Promise<SessionGrant> {
    const ttlHours = this.configService.get('SESSION_TTL_HOURS', { infer: true });
    const session = await this.sessionRepository.save(
      this.sessionRepository.create({
        token: randomBytes(32).toString('hex'),
        userId: user.id,
        expiresAt: new Date(Date.now() + ttlHours * HOUR_MS),
      }),
    );

    return {
      token: session.token,
      expiresAt: session.expiresAt,
      user: { id: user.id, username: user.username },
    };
  }
}
