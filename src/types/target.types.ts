/**
 * A tracked platform account whose notifications timeline is polled.
 */
export interface Target {
  id: number
  handle: string
  auth_token: string
  csrf_token: string
  /** Newest item id already recorded; null until the first item is seen */
  cursor: string | null
  next_poll_at: Date | null
  last_polled_at: Date | null
  consecutive_failures: number
  last_error: string | null
  created_at: string
  updated_at: string
}

export interface TargetCreate {
  handle: string
  auth_token: string
  csrf_token: string
}

export interface TargetUpsertResult {
  target: Target
  created: boolean
}

/**
 * Schedule bookkeeping written back after every poll attempt.
 */
export interface TargetPollRecord {
  last_polled_at: Date
  next_poll_at: Date
  consecutive_failures: number
  last_error: string | null
}

/**
 * Session credentials sent with every platform request made for a target.
 */
export interface PlatformCredentials {
  authToken: string
  csrfToken: string
}
