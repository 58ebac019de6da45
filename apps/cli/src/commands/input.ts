import chalk from 'chalk'
import type { Command } from 'commander'
import type { z } from 'zod'

/** Validate the merged command and global options, or print the issues and exit. */
export function parseOptionsOrExit<T extends z.ZodTypeAny>(schema: T, cmd: Command): z.output<T> {
  const validation: z.SafeParseReturnType<z.input<T>, z.output<T>> = schema.safeParse(
    cmd.optsWithGlobals()
  )

  if (!validation.success) {
    console.error(chalk.red('Invalid input:'))
    validation.error.issues.forEach((issue) => {
      console.error(chalk.yellow(`- ${issue.path.join('.')}: ${issue.message}`))
    })
    process.exit(1)
  }

  return validation.data
}
