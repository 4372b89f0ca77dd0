import type { DeliveryReceipt, NotificationMessage, Notifier } from './types.js'

/** Writes the headline to a stream; the report itself stays on disk */
export class ConsoleNotifier implements Notifier {
  readonly kind = 'console' as const

  constructor(private readonly _out: NodeJS.WritableStream = process.stdout) {}

  async send(message: NotificationMessage): Promise<DeliveryReceipt> {
    this._out.write(`${message.title}\n  ${message.headline}\n`)
    return { channel: this.kind, messageIds: [] }
  }
}

export class NullNotifier implements Notifier {
  readonly kind = 'none' as const

  async send(_message: NotificationMessage): Promise<DeliveryReceipt> {
    return { channel: this.kind, messageIds: [] }
  }
}
