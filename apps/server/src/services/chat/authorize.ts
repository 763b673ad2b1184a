import type { Identity } from '@switchboard/shared/chat-schemas';
import { describeDenial, hasPermission, type Permission } from '@switchboard/shared/permissions';
import { AuthorizationError } from '../../lib/errors.js';
import type { ReaderScope } from './message-store.js';

/** @throws AuthorizationError when the identity's role lacks the permission */
export function authorize(identity: Identity, permission: Permission): void {
  if (!hasPermission(identity.role, permission)) {
    throw new AuthorizationError(describeDenial(identity.role, permission), permission);
  }
}

/** The direct-message visibility a reader's role grants. */
export function readerScope(identity: Identity): ReaderScope {
  return {
    username: identity.username,
    seesAllDirect: hasPermission(identity.role, 'view_all_direct_messages'),
  };
}
