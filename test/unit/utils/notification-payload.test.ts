import {
  buildNotificationPayload,
  notificationTitle,
} from '@utils/notification-payload.js'
import { describe, expect, it } from 'vitest'

describe('notification-payload', () => {
  it('should title known notification types', () => {
    expect(notificationTitle('like')).toBe('New Like')
    expect(notificationTitle('retweet')).toBe('New Repost')
    expect(notificationTitle('follow')).toBe('New Follower')
  })

  it('should use a generic title for other types', () => {
    expect(notificationTitle('unknown')).toBe('New Notification')
    expect(notificationTitle('constructor')).toBe('New Notification')
  })

  it('should build the delivery body for an item', () => {
    expect(
      buildNotificationPayload(7, {
        id: '1790000000000000001',
        type: 'reply',
        message: 'Bob replied to your post',
        url: 'https://platform.test/i/status/42',
        iconUrl: null,
        fromUsers: ['Bob'],
      }),
    ).toEqual({
      title: 'New Reply',
      message: 'Bob replied to your post',
      priority: 3,
      data: {
        url: 'https://platform.test/i/status/42',
        notification_type: 'reply',
        sort_index: '1790000000000000001',
        target_id: 7,
        from_users: ['Bob'],
      },
    })
  })
})
