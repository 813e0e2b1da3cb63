import type { MediaDescriptor } from '../source/types.js'

export type DeliveryOutcome =
  | { ok: true; status: number }
  | { ok: false; status?: number; error: string }

export interface Notifier {
  readonly name: string
  deliver(message: string, media: MediaDescriptor[]): Promise<DeliveryOutcome>
}

export class DeliveryError extends Error {
  constructor(
    message: string,
    public readonly postId: string,
    public readonly status?: number
  ) {
    super(message)
    this.name = 'DeliveryError'
  }
}
