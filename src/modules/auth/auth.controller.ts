import { Body, Controller, Get, HttpCode, Post, Req, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { User } from '../../entities/user.entity';
import { AuthService } from './auth.service';
import { AuthenticatedRequest } from './auth.types';
import { LoginDto, SignupDto } from './dto/credentials.dto';
import { UserAuthGuard } from './guards/user-auth.guard';

@ApiTags('auth')
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('signup')
  @ApiOperation({ summary: 'Register a user with a free plan and sign in' })
  async signup(@Body() dto: SignupDto) {
    return { success: true, data: await this.authService.signup(dto) };
  }

  @Post('login')
  @HttpCode(200)
  @ApiOperation({ summary: 'Exchange credentials for a session token' })
  async login(@Body() dto: LoginDto) {
    return { success: true, data: await this.authService.login(dto) };
  }

  @Post('logout')
  @HttpCode(200)
  @UseGuards(UserAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Revoke the current session token' })
  async logout(@Req() request: AuthenticatedRequest) {
    if (request.sessionToken) {
      await this.authService.logout(request.sessionToken);
    }
    return { success: true };
  }

  @Get('me')
  @UseGuards(UserAuthGuard)
  @ApiBearerAuth()
  me(@CurrentUser() user: User) {
    return { success: true, data: { id: user.id, username: user.username, createdAt: user.createdAt } };
  }
}
