import { createSpinner } from 'nanospinner'
import pc from 'picocolors'
import cac from 'cac'

import type { GlobalOptions } from './create-release-context'

import { promptCommitSelection } from '../core/interactive/prompt-commit-selection'
import { releaseFromJira } from '../core/release/release-from-jira'
import { createReleaseContext } from './create-release-context'
import { printReleaseInfo } from './print-release-info'
import { applyCherryPicks } from './apply-cherry-picks'
import { printCommits } from './print-commits'
import { printIssues } from './print-issues'
import { printError } from './print-error'
import { version } from '../package.json'

/** Options of the `commits` command. */
interface CommitsOptions extends GlobalOptions {
  /** Print commit URLs. */
  urls?: boolean
}

/** Options of the `pick` command. */
interface PickOptions extends GlobalOptions {
  /** Keep commits whose issue already has a commit on the branch. */
  includeApplied?: boolean

  /** List the commits without applying them. */
  dryRun?: boolean

  /** Pick every commit without asking. */
  yes?: boolean
}

/**
 * Run a command action, reporting failures and exiting with code 1.
 *
 * @param action - Command body.
 * @returns Action for cac.
 */
function guarded<Arguments extends unknown[]>(
  action: (...args: Arguments) => Promise<void>,
): (...args: Arguments) => Promise<void> {
  return async (...args) => {
    try {
      await action(...args)
    } catch (error) {
      printError(error)
      process.exit(1)
    }
  }
}

/** Run the CLI. */
export function run(): void {
  let cli = cac('release-curator')

  cli
    .help()
    .version(version)
    .option('--project <key>', 'Jira project key (default: ARROW)')
    .option('--jira-url <url>', 'Jira server URL')
    .option('--repo <path>', 'Path to the git repository (default: cwd)')

  cli
    .command('info <version>', 'Show kind, branch, tag and neighbours')
    .action(
      guarded(async (versionName: string, options: GlobalOptions) => {
        let context = await createReleaseContext(options)
        let spinner = createSpinner(`Loading ${versionName}...`).start()
        let release = await releaseFromJira(versionName, context).catch(
          (error: unknown) => {
            spinner.error('Failed')
            throw error
          },
        )
        spinner.success(`Release ${pc.yellow(versionName)}`)
        await printReleaseInfo(release)
      }),
    )

  cli
    .command('issues <version>', 'List the issues fixed in a release')
    .action(
      guarded(async (versionName: string, options: GlobalOptions) => {
        let context = await createReleaseContext(options)
        let spinner = createSpinner('Fetching issues...').start()
        try {
          let release = await releaseFromJira(versionName, context)
          let issues = await release.getIssues()
          spinner.success(
            `Found ${pc.yellow(issues.size)} issues for ${versionName}`,
          )
          printIssues(issues.values())
        } catch (error) {
          spinner.error('Failed')
          throw error
        }
      }),
    )

  cli
    .command('commits <version>', 'List the commits of a release')
    .option('--urls', 'Print commit URLs')
    .action(
      guarded(async (versionName: string, options: CommitsOptions) => {
        let context = await createReleaseContext(options)
        let spinner = createSpinner('Reading git history...').start()
        try {
          let release = await releaseFromJira(versionName, context)
          let commits = await release.getCommits()
          spinner.success(
            `Found ${pc.yellow(commits.length)} commits for ${versionName}`,
          )
          printCommits(commits, { urls: options.urls })
        } catch (error) {
          spinner.error('Failed')
          throw error
        }
      }),
    )

  cli
    .command('pick <version>', 'Cherry-pick fixes onto a maintenance branch')
    .option('--include-applied', 'Keep commits already on the branch')
    .option('--dry-run', 'Preview commits without applying them')
    .option('--yes, -y', 'Skip the selection prompt')
    .action(
      guarded(async (versionName: string, options: PickOptions) => {
        let context = await createReleaseContext(options)
        let release = await releaseFromJira(versionName, context)

        if (release.kind === 'major') {
          console.info(
            pc.green(
              `\n✨ ${versionName} is cut from ${release.branch}, ` +
                'nothing to cherry-pick\n',
            ),
          )
          return
        }

        let spinner = createSpinner('Selecting commits...').start()
        let commits = await release
          .getCommitsToPick({ excludeAlreadyApplied: !options.includeApplied })
          .catch((error: unknown) => {
            spinner.error('Failed')
            throw error
          })

        if (commits.length === 0) {
          spinner.success('Nothing to cherry-pick')
          return
        }
        spinner.success(
          `Found ${pc.yellow(commits.length)} commits for ${release.branch}`,
        )

        if (options.dryRun) {
          console.info(pc.yellow('\n📋 Dry Run - No changes will be made\n'))
          printCommits(commits)
          return
        }

        let selected = options.yes
          ? commits
          : await promptCommitSelection(commits)
        if (!selected) {
          console.info(pc.gray('\nNo commits applied'))
          return
        }

        console.info(
          pc.yellow(`\n🔄 Cherry-picking ${selected.length} commits...\n`),
        )
        await applyCherryPicks(context.repo, selected, release.branch)
        console.info(pc.green('\n✓ Commits applied successfully!'))
      }),
    )

  cli.command('', 'Show help').action(() => {
    cli.outputHelp()
  })

  cli.parse()
}
