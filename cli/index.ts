import pc from 'picocolors'
import cac from 'cac'

import { DEFAULT_USER_AGENT } from '../core/api/fetch-release'
import { formatErrorMessage } from './format-error-message'
import { normalizeTimeout } from './normalize-timeout'
import { version } from '../package.json'
import { runCheck } from './run-check'
import { ExitCode } from './exit-code'

/** CLI Options. */
interface CLIOptions {
  /** Request timeout in milliseconds. */
  timeout?: string | number

  /** User-Agent header value. */
  userAgent: string | number

  /** Print a JSON report. */
  json?: boolean
}

/**
 * Run the CLI.
 *
 * @param argv - Raw process arguments.
 * @returns Exit code for the process.
 */
export async function run(argv: string[] = process.argv): Promise<ExitCode> {
  let cli = cac('gh-release-check')
  let exitCode: ExitCode = ExitCode.UpToDate

  cli
    .command(
      '<repository> <local-version>',
      'Check a GitHub repository for a release newer than the local version',
    )
    .option('--json', 'Print the result as JSON')
    .option('--timeout <ms>', 'Abort the request after this many milliseconds')
    .option('--user-agent <value>', 'User-Agent header for the request', {
      default: DEFAULT_USER_AGENT,
    })
    .example('gh-release-check https://github.com/octocat/hello-world 1.2.0')
    .action(
      async (repository: string, localVersion: string, options: CLIOptions) => {
        exitCode = await runCheck(repository, localVersion, {
          timeout: normalizeTimeout(options.timeout),
          userAgent: String(options.userAgent),
          json: options.json ?? false,
        })
      },
    )

  cli.help().version(version)

  try {
    cli.parse(argv, { run: false })

    if (cli.options['help'] || cli.options['version']) {
      return ExitCode.UpToDate
    }

    await cli.runMatchedCommand()
  } catch (error) {
    console.error(pc.redBright('Error:'), formatErrorMessage(error))
    cli.outputHelp()
    return ExitCode.UsageError
  }

  return exitCode
}
