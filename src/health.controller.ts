import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation } from '@nestjs/swagger';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { isConnectionHealthy } from './utils/database.utils';

@ApiTags('health')
@Controller()
export class HealthController {
  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  @Get('health')
  @ApiOperation({ summary: 'Health check endpoint' })
  async getHealth() {
    const database = await isConnectionHealthy(this.dataSource);
    return {
      status: database ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      database: database ? 'up' : 'down',
    };
  }

  @Get()
  @ApiOperation({ summary: 'Root endpoint' })
  getRoot() {
    return {
      name: 'Asset Insights API',
      version: '1.0.0',
      status: 'running',
    };
  }
}
