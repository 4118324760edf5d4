import { Controller, Get, UseGuards } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { User } from '../../entities/user.entity';
import { OptionalUserAuthGuard } from '../auth/guards/user-auth.guard';
import { HomeService } from './home.service';

@ApiTags('home')
@Controller('home')
export class HomeController {
  constructor(private readonly homeService: HomeService) {}

  @Get()
  @UseGuards(OptionalUserAuthGuard)
  @ApiOperation({ summary: 'Highlighted assets and the newest predictions' })
  async getHome(@CurrentUser() user?: User) {
    return { success: true, data: await this.homeService.getHome(user) };
  }
}
