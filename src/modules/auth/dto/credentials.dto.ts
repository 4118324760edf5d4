import { IsString, Length, Matches, MaxLength, MinLength } from 'class-validator';

export class LoginDto {
  @IsString()
  @Length(1, 150)
  username!: string;

  @IsString()
  @MinLength(1)
  @MaxLength(128)
  password!: string;
}

export class SignupDto {
  @IsString()
  @Length(3, 150)
  @Matches(/^[\w.@+-]+$/, { message: 'username may only contain letters, digits and @.+-_' })
  username!: string;

  @IsString()
  @MinLength(8)
  @MaxLength(128)
  password!: string;
}
