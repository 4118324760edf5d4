import { IsEmail, IsString, Length, MaxLength } from 'class-validator';

export class CreateContactMessageDto {
  @IsString()
  @Length(1, 150)
  name!: string;

  @IsEmail()
  @MaxLength(254)
  email!: string;

  @IsString()
  @Length(1, 150)
  topic!: string;

  @IsString()
  @Length(1, 5000)
  message!: string;
}
