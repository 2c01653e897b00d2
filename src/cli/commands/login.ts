import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import type { Command } from 'commander'
import { loadConfig, ConfigError } from '../../config/index.js'
import { AuditLogger } from '../../audit/index.js'
import { RemoteAuthSession, RetryBudgetExhaustedError } from '../../gateway/index.js'
import { TicketExchangeError } from '../../api/index.js'
import type { RemoteLoginConfig, SessionPhase } from '../../types/index.js'
import { output } from '../output.js'

/** Exit code when the companion device cancels the login */
export const EXIT_CANCELLED = 2
/** Exit code when the user interrupts with Ctrl+C */
export const EXIT_ABORTED = 130

/** Render a phase as one status line. */
export function describePhase(phase: SessionPhase): string {
  switch (phase.status) {
    case 'loading':
      return 'Connecting to remote auth gateway...'
    case 'qr_code':
      return `Scan this QR code URL with the mobile app: ${phase.displayPayload}`
    case 'accepted':
      return `Approve the login on your phone to continue as ${phase.user.displayName} (${phase.user.userId})`
    case 'cancelled':
      return 'Login was cancelled on the mobile app'
    case 'completed':
      return 'Token received'
  }
}

/**
 * Register the `login` command on the Commander program.
 *
 * Runs the QR remote-auth flow, prints each phase to stderr and the
 * token to stdout. Storing the token is left to the caller.
 */
export function registerLoginCommand(program: Command): void {
  program
    .command('login')
    .description('Log in by scanning a QR code with the mobile app')
    .option('-c, --config <path>', 'configuration file path (defaults and QR_LOGIN_* env vars if omitted)')
    .action(async (options: { config?: string }) => {
      let config: RemoteLoginConfig
      try {
        config = loadConfig(options.config)
      } catch (err) {
        if (err instanceof ConfigError) {
          output.error(err.message)
          process.exit(1)
          return
        }
        throw err
      }

      let auditLogger: AuditLogger | undefined
      if (config.audit.enabled) {
        mkdirSync(dirname(config.audit.path), { recursive: true })
        auditLogger = new AuditLogger(config.audit.path)
        output.info(`Session events: ${config.audit.path}`)
      }

      const session = RemoteAuthSession.fromConfig(config, { auditLogger })
      let lastLine = ''
      const unsubscribe = session.phases.onPhase((phase) => {
        const line = describePhase(phase)
        if (line !== lastLine) output.info(line)
        lastLine = line
      })

      const controller = new AbortController()
      const onSigint = (): void => controller.abort()
      process.once('SIGINT', onSigint)

      try {
        const result = await session.login(controller.signal)
        switch (result.status) {
          case 'completed':
            output.success(
              result.user ? `Logged in as ${result.user.displayName}` : 'Logged in',
            )
            output.result(result.token)
            return
          case 'cancelled':
            process.exit(EXIT_CANCELLED)
            return
          case 'aborted':
            output.warn('Login aborted')
            process.exit(EXIT_ABORTED)
            return
        }
      } catch (err) {
        if (err instanceof TicketExchangeError) {
          output.error(`Ticket exchange failed (HTTP ${err.statusCode}): ${err.message}`)
          for (const field of err.fieldErrors) {
            output.error(`  ${field.path}: ${field.message}`)
          }
        } else if (err instanceof RetryBudgetExhaustedError) {
          output.error(err.message)
        } else {
          output.error(err instanceof Error ? err.message : String(err))
        }
        process.exit(1)
      } finally {
        if (session.auditError) {
          output.warn(`Session event log write failed: ${session.auditError.message}`)
        }
        unsubscribe()
        process.off('SIGINT', onSigint)
      }
    })
}
