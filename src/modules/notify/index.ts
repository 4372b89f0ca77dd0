export { buildNotification } from './types.js'
export type { DeliveryReceipt, NotificationMessage, Notifier, NotifierKind, NotifierSettings } from './types.js'
export { SLACK_CHUNK_LIMIT, markdownToSlack, splitMessage } from './message-splitter.js'
export { SlackNotifier, SLACK_POST_MESSAGE_URL } from './slack-notifier.js'
export type { SlackNotifierOptions } from './slack-notifier.js'
export { ConsoleNotifier, NullNotifier } from './console-notifier.js'
export { createNotifier } from './notifier-factory.js'
