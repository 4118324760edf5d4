import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { extractBearerToken } from '../../../common/guards/api-token.guard';
import { AuthService } from '../auth.service';
import { AuthenticatedRequest } from '../auth.types';

/**
 * Requires a valid session token and attaches its user to the request.
 */
@Injectable()
export class UserAuthGuard implements CanActivate {
  constructor(private readonly authService: AuthService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearerToken(request.headers.authorization);
    const user = token ? await this.authService.authenticate(token) : null;

    if (!token || !user) {
      throw new UnauthorizedException('Login required');
    }

    request.user = user;
    request.sessionToken = token;
    return true;
  }
}

/**
 * Attaches the user when a valid token is sent; anonymous requests pass.
 */
@Injectable()
export class OptionalUserAuthGuard implements CanActivate {
  constructor(private readonly authService: AuthService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearerToken(request.headers.authorization);
    if (token) {
      request.user = (await this.authService.authenticate(token)) ?? undefined;
    }
    return true;
  }
}
