/**
 * Internal records → snake_case wire shapes.
 *
 * @module services/chat/presenters
 */
import type { ConnectionStats } from '@switchboard/delivery';
import type {
  ConnectionStatsResponse,
  Identity,
  OwnProfile,
  Pagination,
  UserProfile,
} from '@switchboard/shared/chat-schemas';
import { isAdmin, isBot, isViewer } from '@switchboard/shared/permissions';

export function toUserProfile(identity: Identity): UserProfile {
  return {
    username: identity.username,
    role: identity.role,
    logo: identity.logo,
    emoji: identity.emoji,
    is_admin: isAdmin(identity),
    is_viewer: isViewer(identity),
    is_bot: isBot(identity),
    created_by: identity.createdBy,
    created_at: identity.createdAt,
  };
}

/** Profile as its owner sees it, including the webhook URL. */
export function toOwnProfile(identity: Identity): OwnProfile {
  return { ...toUserProfile(identity), webhook_url: identity.webhookUrl };
}

export function toConnectionStats(stats: ConnectionStats): ConnectionStatsResponse {
  return {
    username: stats.username,
    connection_id: stats.connectionId,
    connected_at: stats.connectedAt,
    last_activity: stats.lastActivityAt,
    last_pong: stats.lastProbeAckAt,
    seconds_since_activity: Math.round(stats.secondsSinceActivity * 10) / 10,
    seconds_since_pong: Math.round(stats.secondsSinceProbeAck * 10) / 10,
    is_healthy: stats.healthy,
  };
}

export function toPagination(total: number, offset: number, limit: number, returned: number): Pagination {
  return { total, offset, limit, has_more: offset + returned < total };
}
