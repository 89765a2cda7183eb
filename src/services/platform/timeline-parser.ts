import { TransientNetworkError } from '@root/types/errors.js'
import type { PlatformItem } from '@root/types/platform.types.js'
import { compareItemIds } from '@utils/item-id.js'
import { z } from 'zod'

const TextSchema = z.object({ text: z.string().optional() })

const ItemContentSchema = z.object({
  notificationType: z.string().optional(),
  message: TextSchema.optional(),
  header: TextSchema.optional(),
  url: z.object({ url: z.string().optional() }).optional(),
  icon: z.object({ iconUrl: z.string().optional() }).optional(),
  tweet_results: z
    .object({
      result: z
        .object({
          rest_id: z.string().optional(),
          legacy: z.object({ full_text: z.string().optional() }).optional(),
        })
        .optional(),
    })
    .optional(),
  fromUsers: z.array(z.unknown()).optional(),
})

const FromUserSchema = z.object({
  user_results: z.object({
    result: z.object({
      legacy: z.object({ name: z.string() }),
    }),
  }),
})

const EntrySchema = z.object({
  entryId: z.string().default(''),
  sortIndex: z.string().default(''),
  content: z.object({ itemContent: ItemContentSchema.optional() }).optional(),
})

const InstructionSchema = z.object({
  type: z.string().optional(),
  entries: z.array(z.unknown()).optional(),
})

const TimelineResponseSchema = z.object({
  errors: z.array(z.object({ message: z.string().optional() })).optional(),
  data: z
    .object({
      user: z
        .object({
          result: z
            .object({
              timeline: z
                .object({
                  timeline: z
                    .object({ instructions: z.array(z.unknown()).optional() })
                    .optional(),
                })
                .optional(),
            })
            .optional(),
        })
        .optional(),
    })
    .optional(),
})

export const BadgeCountSchema = z.object({
  ntab_unread_count: z.number().default(0),
})

const TYPE_ALIASES: Record<string, string> = {
  likes: 'like',
  liked: 'like',
  retweets: 'retweet',
  retweeted: 'retweet',
  replies: 'reply',
  replied: 'reply',
  mentions: 'mention',
  mentioned: 'mention',
  follows: 'follow',
  followed: 'follow',
  quotes: 'quote',
  quoted: 'quote',
}

export function normalizeNotificationType(type: string): string {
  const lower = type.toLowerCase()
  return Object.hasOwn(TYPE_ALIASES, lower) ? TYPE_ALIASES[lower] : lower
}

type ItemContent = z.infer<typeof ItemContentSchema>

function extractMessage(content: ItemContent): string {
  return (
    content.message?.text ??
    content.header?.text ??
    content.tweet_results?.result?.legacy?.full_text ??
    'New notification'
  )
}

function extractFromUsers(content: ItemContent): string[] {
  const users: string[] = []
  for (const user of content.fromUsers ?? []) {
    const parsed = FromUserSchema.safeParse(user)
    if (parsed.success) users.push(parsed.data.user_results.result.legacy.name)
  }
  return users
}

function extractUrl(content: ItemContent, baseUrl: string): string | null {
  if (content.url?.url) return content.url.url
  const statusId = content.tweet_results?.result?.rest_id
  return statusId ? new URL(`/i/status/${statusId}`, baseUrl).href : null
}

/**
 * Reads the notification items out of a timeline response.
 *
 * Only `TimelineAddEntries` instructions are read; cursor entries, entries
 * without a sort index and entries of unexpected shape are skipped.
 *
 * @param baseUrl - Origin used to build status links
 * @returns Items newest first
 * @throws TransientNetworkError when the body is not a timeline or carries API errors
 */
export function parseTimeline(body: unknown, baseUrl: string): PlatformItem[] {
  const parsed = TimelineResponseSchema.safeParse(body)
  if (!parsed.success) {
    throw new TransientNetworkError('Unexpected timeline response shape')
  }

  const firstError = parsed.data.errors?.[0]
  if (firstError) {
    throw new TransientNetworkError(
      `Platform API error: ${firstError.message ?? 'Unknown error'}`,
    )
  }

  const instructions =
    parsed.data.data?.user?.result?.timeline?.timeline?.instructions ?? []
  const items: PlatformItem[] = []

  for (const raw of instructions) {
    const instruction = InstructionSchema.safeParse(raw)
    if (!instruction.success || instruction.data.type !== 'TimelineAddEntries') {
      continue
    }

    for (const rawEntry of instruction.data.entries ?? []) {
      const entry = EntrySchema.safeParse(rawEntry)
      if (!entry.success) continue

      const { entryId, sortIndex, content } = entry.data
      if (entryId.startsWith('cursor-') || sortIndex === '') continue

      const itemContent = content?.itemContent
      if (!itemContent) continue

      items.push({
        id: sortIndex,
        type: normalizeNotificationType(
          itemContent.notificationType ?? 'unknown',
        ),
        message: extractMessage(itemContent),
        url: extractUrl(itemContent, baseUrl),
        iconUrl: itemContent.icon?.iconUrl ?? null,
        fromUsers: extractFromUsers(itemContent),
      })
    }
  }

  return items.sort((a, b) => compareItemIds(b.id, a.id))
}
