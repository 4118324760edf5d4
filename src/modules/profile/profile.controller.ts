import {
  Body,
  Controller,
  DefaultValuePipe,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  ParseUUIDPipe,
  Patch,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { ApiTokenGuard } from '../../common/guards/api-token.guard';
import { User } from '../../entities/user.entity';
import { UserAuthGuard } from '../auth/guards/user-auth.guard';
import { SetPlanDto } from './dto/set-plan.dto';
import { ProfileService } from './profile.service';

@ApiTags('profile')
@ApiBearerAuth()
@Controller('profile')
export class ProfileController {
  constructor(private readonly profileService: ProfileService) {}

  @Get()
  @UseGuards(UserAuthGuard)
  @ApiOperation({ summary: 'Plan, favorite assets and their latest predictions' })
  async getProfile(@CurrentUser() user: User) {
    return { success: true, data: await this.profileService.getProfile(user) };
  }

  @Get('dashboard')
  @UseGuards(UserAuthGuard)
  @ApiOperation({ summary: 'Favorites with quotes, their predictions, viewed predictions and crypto news' })
  async getDashboard(@CurrentUser() user: User) {
    return { success: true, data: await this.profileService.getDashboard(user) };
  }

  @Get('history')
  @UseGuards(UserAuthGuard)
  @ApiOperation({ summary: 'Predictions the user has viewed, newest first' })
  @ApiQuery({ name: 'limit', required: false, example: 20 })
  async getHistory(
    @CurrentUser() user: User,
    @Query('limit', new DefaultValuePipe(20), ParseIntPipe) limit: number,
  ) {
    const data = await this.profileService.getPredictionHistory(user, Math.min(Math.max(limit, 1), 100));
    return { success: true, count: data.length, data };
  }

  @Post('favorites/:ticker/toggle')
  @UseGuards(UserAuthGuard)
  @ApiOperation({ summary: 'Add the asset to favorites, or remove it when already there' })
  async toggleFavorite(@CurrentUser() user: User, @Param('ticker') ticker: string) {
    return { success: true, data: await this.profileService.toggleFavorite(user, ticker) };
  }

  @Put('favorites/:ticker')
  @UseGuards(UserAuthGuard)
  async addFavorite(@CurrentUser() user: User, @Param('ticker') ticker: string) {
    return { success: true, data: await this.profileService.addFavorite(user, ticker) };
  }

  @Delete('favorites/:ticker')
  @UseGuards(UserAuthGuard)
  async removeFavorite(@CurrentUser() user: User, @Param('ticker') ticker: string) {
    return { success: true, data: await this.profileService.removeFavorite(user, ticker) };
  }

  @Patch(':userId/plan')
  @UseGuards(ApiTokenGuard)
  @ApiOperation({ summary: 'Set a user\'s subscription plan (admin)' })
  async setPlan(@Param('userId', ParseUUIDPipe) userId: string, @Body() dto: SetPlanDto) {
    return { success: true, data: await this.profileService.setSubscriptionPlan(userId, dto.plan) };
  }
}
