/** Configuration file looked up in the working directory. */
export const CONFIG_FILE_NAME = '.release-curator.yml'
