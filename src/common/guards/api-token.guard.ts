import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { EnvConfig } from '../../config/env.validation';

/**
 * `Authorization: Bearer <token>`; a bare header value is taken as the token.
 */
export function extractBearerToken(authHeader?: string): string | null {
  if (!authHeader) return null;
  const [scheme, token] = authHeader.split(' ');
  if (scheme?.toLowerCase() === 'bearer' && token) return token.trim();
  return authHeader.trim() || null;
}

/**
 * Guards admin endpoints with the shared ADMIN_API_TOKEN, sent as a bearer
 * token or in `x-api-key`.
 */
@Injectable()
export class ApiTokenGuard implements CanActivate {
  private readonly logger = new Logger(ApiTokenGuard.name);

  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const expectedToken = this.configService.get('ADMIN_API_TOKEN', { infer: true });

    if (!expectedToken) {
      this.logger.error('ADMIN_API_TOKEN is not configured');
      throw new UnauthorizedException('Server authentication is not configured');
    }

    const apiKeyHeader = request.headers['x-api-key'];
    const apiKey = Array.isArray(apiKeyHeader) ? apiKeyHeader[0] : apiKeyHeader;

    const providedToken = extractBearerToken(request.headers.authorization) ?? apiKey;
    if (!providedToken || providedToken !== expectedToken) {
      throw new UnauthorizedException('Unauthorized');
    }

    return true;
  }
}
