import { ConfigError } from '../../core/errors.js'
import { ConsoleNotifier, NullNotifier } from './console-notifier.js'
import { SlackNotifier } from './slack-notifier.js'
import type { Notifier, NotifierSettings } from './types.js'

/**
 * @throws {ConfigError} when Slack is selected without a channel or token
 */
export function createNotifier(settings: NotifierSettings, env: NodeJS.ProcessEnv = process.env): Notifier {
  switch (settings.kind) {
    case 'none':
      return new NullNotifier()
    case 'console':
      return new ConsoleNotifier()
    case 'slack': {
      const token = env[settings.token_env]
      if (settings.channel === undefined || settings.channel === '') {
        throw new ConfigError('notify.channel is required for the slack notifier')
      }
      if (token === undefined || token === '') {
        throw new ConfigError(`Environment variable ${settings.token_env} is not set`, { token_env: settings.token_env })
      }
      return new SlackNotifier({ token, channel: settings.channel })
    }
  }
}
