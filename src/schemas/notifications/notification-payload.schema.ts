import { z } from 'zod'

/**
 * Body POSTed to subscriber endpoints, also stored with every event.
 */
export const NotificationPayloadSchema = z.object({
  title: z.string(),
  message: z.string(),
  priority: z.number().int(),
  data: z.object({
    url: z.string().nullable(),
    notification_type: z.string(),
    sort_index: z.string(),
    target_id: z.number().int(),
    from_users: z.array(z.string()),
  }),
})
