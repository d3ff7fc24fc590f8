/**
 * Child process fixture for the premature-exit integration test.
 *
 * Behaves like a server missing its configuration: prints a diagnostic
 * line on stderr and exits with code 3 before any protocol exchange.
 */
process.stderr.write('ERROR missing config file\n')
process.exit(3)
