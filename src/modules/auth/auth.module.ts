import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthSession } from '../../entities/auth-session.entity';
import { User } from '../../entities/user.entity';
import { UserProfile } from '../../entities/user-profile.entity';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { OptionalUserAuthGuard, UserAuthGuard } from './guards/user-auth.guard';

@Module({
  imports: [TypeOrmModule.forFeature([User, AuthSession, UserProfile])],
  controllers: [AuthController],
  providers: [AuthService, UserAuthGuard, OptionalUserAuthGuard],
  exports: [AuthService, UserAuthGuard, OptionalUserAuthGuard],
})
export class AuthModule {}
