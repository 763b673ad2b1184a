/**
 * Role → permission table.
 *
 * The role is the single source of truth for what an identity may do. The
 * `isAdmin` / `isViewer` / `isBot` helpers are derived from it and never
 * stored.
 *
 * @module shared/permissions
 */
import { z } from 'zod';
import type { Role } from './chat-schemas.js';

export const PermissionSchema = z.enum([
  'read_messages',
  'read_users',
  'send_room_message',
  'send_direct_message',
  'receive_direct_message',
  'view_all_direct_messages',
  'update_own_profile',
  'create_bot',
  'manage_users',
  'moderate_messages',
  'view_connections',
]);

export type Permission = z.infer<typeof PermissionSchema>;

const ADMIN_PERMISSIONS: readonly Permission[] = PermissionSchema.options.filter(
  (p) => p !== 'view_all_direct_messages',
);

export const ROLE_PERMISSIONS = {
  admin: new Set(ADMIN_PERMISSIONS),
  member: new Set<Permission>([
    'read_messages',
    'read_users',
    'send_room_message',
    'send_direct_message',
    'receive_direct_message',
    'update_own_profile',
    'create_bot',
  ]),
  viewer: new Set<Permission>(['read_messages', 'read_users', 'view_all_direct_messages']),
  bot: new Set<Permission>(['read_messages', 'read_users', 'send_room_message', 'update_own_profile']),
} satisfies Record<Role, ReadonlySet<Permission>>;

/** Human phrasing used in permission-denied messages. */
const PERMISSION_ACTIONS: Record<Permission, string> = {
  read_messages: 'read messages',
  read_users: 'list users',
  send_room_message: 'send room messages',
  send_direct_message: 'send direct messages',
  receive_direct_message: 'receive direct messages',
  view_all_direct_messages: 'view all direct messages',
  update_own_profile: 'update their profile',
  create_bot: 'create bots',
  manage_users: 'manage users',
  moderate_messages: 'moderate messages',
  view_connections: 'view connections',
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].has(permission);
}

/** e.g. `Your role 'bot' does not have permission to send direct messages` */
export function describeDenial(role: Role, permission: Permission): string {
  return `Your role '${role}' does not have permission to ${PERMISSION_ACTIONS[permission]}`;
}

export function isAdmin(identity: { role: Role }): boolean {
  return identity.role === 'admin';
}

export function isViewer(identity: { role: Role }): boolean {
  return identity.role === 'viewer';
}

export function isBot(identity: { role: Role }): boolean {
  return identity.role === 'bot';
}
