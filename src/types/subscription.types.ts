export interface Subscription {
  id: number
  target_id: number
  endpoint: string
  secret: string
  created_at: string
}

export interface SubscriptionCreate {
  target_id: number
  endpoint: string
  secret: string
}
