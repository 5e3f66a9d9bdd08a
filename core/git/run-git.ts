import { execFile } from 'node:child_process'

/** Upper bound for git output, large enough for a full release log. */
const MAX_BUFFER = 256 * 1024 * 1024

/**
 * Run git in a directory and collect its stdout.
 *
 * @param directory - Working tree to run in.
 * @param args - Git arguments.
 * @returns Standard output.
 */
export function runGit(directory: string, args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(
      'git',
      args,
      { maxBuffer: MAX_BUFFER, encoding: 'utf8', cwd: directory },
      (error, stdout) => {
        if (error) {
          reject(error)
          return
        }
        resolve(stdout)
      },
    )
  })
}
