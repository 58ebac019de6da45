const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/

/** Quote an argument the way a POSIX shell would need it. */
export function quoteArg(arg: string): string {
  if (arg !== '' && SAFE_ARG.test(arg)) return arg
  return `'${arg.replace(/'/g, `'\\''`)}'`
}

export function formatArgv(argv: readonly string[]): string {
  return argv.map(quoteArg).join(' ')
}

/** Render an exec as the equivalent shell command line. */
export function formatInvocation(binary: string, container: string, argv: readonly string[]): string {
  return formatArgv([binary, 'exec', container, ...argv])
}
