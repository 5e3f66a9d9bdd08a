/**
 * Fill a commit web URL template.
 *
 * @param template - URL with one or more `{hexsha}` placeholders.
 * @param hexsha - Commit hash.
 * @returns Commit URL.
 */
export function formatCommitUrl(template: string, hexsha: string): string {
  return template.replaceAll('{hexsha}', hexsha)
}
