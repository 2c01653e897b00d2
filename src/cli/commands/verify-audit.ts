import type { Command } from 'commander'
import { verifyAuditChain } from '../../audit/index.js'
import { loadConfig } from '../../config/index.js'
import { output } from '../output.js'

/**
 * Register the `verify-audit` command on the Commander program.
 *
 * Checks the session event log's hash chain. Exit code 0 on a valid or
 * empty chain, 1 on an integrity failure.
 */
export function registerVerifyAuditCommand(program: Command): void {
  program
    .command('verify-audit')
    .description('Verify session event log chain integrity')
    .option('-c, --config <path>', 'configuration file path')
    .option('-p, --path <path>', 'explicit event log path (overrides config)')
    .action((options: { config?: string; path?: string }) => {
      let auditPath: string

      if (options.path) {
        auditPath = options.path
      } else {
        try {
          auditPath = loadConfig(options.config).audit.path
        } catch {
          output.error('Could not load configuration to determine the event log path. Use --path to specify directly.')
          process.exit(1)
          return
        }
      }

      const result = verifyAuditChain(auditPath)

      if (result.entries === 0) {
        output.result('Event log is empty (no entries)')
        return
      }

      if (result.valid) {
        output.result(`Event chain verified: ${result.entries} entries, chain intact`)
        return
      }

      output.error('Event chain BROKEN')
      for (const e of result.errors) {
        output.error(`  Line ${e.line}: ${e.error}`)
      }
      output.result(`${result.entries} entries checked, ${result.errors.length} error(s) found`)
      process.exit(1)
    })
}
