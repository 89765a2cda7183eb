import type {
  NotificationPayload,
  PlatformItem,
} from '@root/types/platform.types.js'

/** UnifiedPush default priority */
const DEFAULT_PRIORITY = 3

const TITLES: Record<string, string> = {
  like: 'New Like',
  retweet: 'New Repost',
  reply: 'New Reply',
  mention: 'New Mention',
  follow: 'New Follower',
  quote: 'New Quote',
}

export function notificationTitle(type: string): string {
  return Object.hasOwn(TITLES, type) ? TITLES[type] : 'New Notification'
}

/**
 * Builds the body delivered to every subscriber of a target for one item.
 */
export function buildNotificationPayload(
  targetId: number,
  item: PlatformItem,
): NotificationPayload {
  return {
    title: notificationTitle(item.type),
    message: item.message,
    priority: DEFAULT_PRIORITY,
    data: {
      url: item.url,
      notification_type: item.type,
      sort_index: item.id,
      target_id: targetId,
      from_users: item.fromUsers,
    },
  }
}
