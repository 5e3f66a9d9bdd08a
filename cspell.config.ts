import { defineConfig } from 'cspell'

export default defineConfig({
  words: [
    'enquirer',
    'hexsha',
    'issuetype',
    'jql',
    'nanospinner',
    'neighbour',
    'neighbours',
    'parquet',
    'rcompare',
  ],
  ignorePaths: ['license', 'package-lock.json', 'tsconfig.json'],
  dictionaries: ['css', 'html', 'node', 'npm', 'typescript'],
  useGitignore: true,
  language: 'en',
})
