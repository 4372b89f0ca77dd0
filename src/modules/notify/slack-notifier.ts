/**
 * SlackNotifier: posts the outcome and the full report through the Slack
 * Web API. The outcome goes out as a Block Kit message; report chunks follow
 * as thread replies.
 */

import { z } from 'zod'
import { NotificationError, errorMessage } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { SLACK_CHUNK_LIMIT, markdownToSlack, splitMessage } from './message-splitter.js'
import type { DeliveryReceipt, NotificationMessage, Notifier } from './types.js'

const logger = createLogger('notify:slack')

export const SLACK_POST_MESSAGE_URL = 'https://slack.com/api/chat.postMessage'

const SlackResponseSchema = z.object({
  ok: z.boolean(),
  ts: z.string().optional(),
  error: z.string().optional(),
})

export interface SlackNotifierOptions {
  token: string
  channel: string
  apiUrl?: string
  maxChunkLength?: number
}

type SlackPayload = Record<string, unknown>

export class SlackNotifier implements Notifier {
  readonly kind = 'slack' as const
  private readonly _token: string
  private readonly _channel: string
  private readonly _apiUrl: string
  private readonly _maxChunkLength: number

  constructor(options: SlackNotifierOptions) {
    this._token = options.token
    this._channel = options.channel
    this._apiUrl = options.apiUrl ?? SLACK_POST_MESSAGE_URL
    this._maxChunkLength = options.maxChunkLength ?? SLACK_CHUNK_LIMIT
  }

  async send(message: NotificationMessage): Promise<DeliveryReceipt> {
    const headerTs = await this._post({
      text: message.headline,
      blocks: [
        { type: 'header', text: { type: 'plain_text', text: message.title } },
        { type: 'section', text: { type: 'mrkdwn', text: `*Evaluation Report* - ${message.headline}` } },
      ],
    })

    const messageIds = [headerTs]
    const chunks = splitMessage(markdownToSlack(message.body), this._maxChunkLength)
    for (const chunk of chunks) {
      messageIds.push(await this._post({ text: chunk, thread_ts: headerTs }))
    }

    logger.info({ sessionId: message.sessionId, channel: this._channel, chunks: chunks.length }, 'Slack notification sent')
    return { channel: this.kind, messageIds }
  }

  private async _post(payload: SlackPayload): Promise<string> {
    let response: Response
    try {
      response = await fetch(this._apiUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json; charset=utf-8',
          Authorization: `Bearer ${this._token}`,
        },
        body: JSON.stringify({ channel: this._channel, unfurl_links: false, ...payload }),
      })
    } catch (err) {
      throw new NotificationError(`Slack request failed: ${errorMessage(err)}`, { channel: this._channel })
    }

    if (!response.ok) {
      throw new NotificationError(`Slack API returned HTTP ${String(response.status)}`, {
        channel: this._channel,
        status: response.status,
      })
    }

    const parsed = SlackResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new NotificationError('Slack API returned an unexpected response', { channel: this._channel })
    }
    if (!parsed.data.ok || parsed.data.ts === undefined) {
      throw new NotificationError(`Slack API error: ${parsed.data.error ?? 'unknown'}`, { channel: this._channel })
    }
    return parsed.data.ts
  }
}
