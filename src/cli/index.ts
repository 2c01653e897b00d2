#!/usr/bin/env node
import { Command } from 'commander'
import { registerLoginCommand } from './commands/login.js'
import { registerVerifyAuditCommand } from './commands/verify-audit.js'

const program = new Command()

program
  .name('qr-login')
  .description('Log in by scanning a QR code with an already signed-in mobile app')
  .version('0.1.0')

registerLoginCommand(program)
registerVerifyAuditCommand(program)

export { program }

await program.parseAsync()
