export const KNOWN_NOTIFICATION_TYPES = [
  'like',
  'retweet',
  'reply',
  'mention',
  'follow',
  'quote',
] as const

/**
 * A single notification entry read from the platform timeline.
 */
export interface PlatformItem {
  /** Opaque, monotonically ordered identifier (the timeline sort index) */
  id: string
  type: string
  message: string
  url: string | null
  iconUrl: string | null
  fromUsers: string[]
}

/**
 * Body POSTed to a subscription endpoint for one notification.
 * Shaped after the UnifiedPush message format so push distributors can
 * render it directly.
 */
export interface NotificationPayload {
  title: string
  message: string
  priority: number
  data: {
    url: string | null
    notification_type: string
    sort_index: string
    target_id: number
    from_users: string[]
  }
}
