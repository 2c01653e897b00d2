/**
 * CLI output helpers.
 *
 * Everything goes through process.stdout/stderr.write so tests can spy on
 * it. Plain text only; the token is the single line written to stdout on
 * success, so status lines go to stderr to keep stdout pipeable.
 */
export const output = {
  /** Write the command's result to stdout. */
  result(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Write a progress/status message to stderr. */
  info(message: string): void {
    process.stderr.write(message + '\n')
  },

  /** Write a success message to stderr, prefixed with "OK:". */
  success(message: string): void {
    process.stderr.write('OK: ' + message + '\n')
  },

  /** Write an error message to stderr, prefixed with "Error:". */
  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  /** Write a warning message to stderr, prefixed with "Warning:". */
  warn(message: string): void {
    process.stderr.write('Warning: ' + message + '\n')
  },
}
