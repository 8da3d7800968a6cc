export const USER_ROLES = [
  'super_admin',
  'admin',
  'manager',
  'cashier',
  'inventory',
  'viewer',
] as const;

export type UserRole = (typeof USER_ROLES)[number];

export type Permission = 'manage_users' | 'view_reports' | 'manage_inventory' | 'manage_sales';

/** The already-authenticated user a request is made on behalf of. */
export interface CallerIdentity {
  userId: string;
  role: UserRole;
  defaultLocationId: string | null;
}

const ROLE_PERMISSIONS: Record<Exclude<UserRole, 'super_admin'>, Permission[]> = {
  admin: ['manage_users', 'view_reports', 'manage_inventory', 'manage_sales'],
  manager: ['view_reports', 'manage_inventory', 'manage_sales'],
  cashier: ['manage_sales'],
  inventory: ['manage_inventory'],
  viewer: ['view_reports'],
};

export function isUserRole(value: string): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}

export function hasPermission(caller: CallerIdentity, permission: Permission): boolean {
  if (caller.role === 'super_admin') {
    return true;
  }

  return ROLE_PERMISSIONS[caller.role].includes(permission);
}
