import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  SetMetadata,
  UnauthorizedException,
  createParamDecorator,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { CallerIdentity, Permission, hasPermission, isUserRole } from './caller';

const PERMISSION_KEY = 'requiredPermission';

// Set by the authenticating gateway in front of this service.
export const CALLER_HEADERS = {
  userId: 'x-user-id',
  role: 'x-user-role',
  locationId: 'x-location-id',
} as const;

export const RequirePermission = (permission: Permission) =>
  SetMetadata(PERMISSION_KEY, permission);

interface HeaderSource {
  header(name: string): string | undefined;
}

type RequestWithCaller = HeaderSource & { caller?: CallerIdentity };

export function readCaller(request: HeaderSource): CallerIdentity | null {
  const userId = request.header(CALLER_HEADERS.userId)?.trim();
  const role = request.header(CALLER_HEADERS.role)?.trim().toLowerCase();
  if (!userId || !role || !isUserRole(role)) {
    return null;
  }

  const locationId = request.header(CALLER_HEADERS.locationId)?.trim();
  return { userId, role, defaultLocationId: locationId || null };
}

@Injectable()
export class CallerGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<RequestWithCaller>();
    const caller = readCaller(request);
    if (!caller) {
      throw new UnauthorizedException('Missing or invalid caller identity');
    }

    const permission = this.reflector.getAllAndOverride<Permission | undefined>(PERMISSION_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (permission && !hasPermission(caller, permission)) {
      throw new ForbiddenException(`Access denied. Required permission: ${permission}`);
    }

    request.caller = caller;
    return true;
  }
}

export const CurrentCaller = createParamDecorator(
  (_data: unknown, context: ExecutionContext): CallerIdentity => {
    const request = context.switchToHttp().getRequest<RequestWithCaller>();
    if (!request.caller) {
      throw new UnauthorizedException('Missing or invalid caller identity');
    }

    return request.caller;
  },
);
