import process from 'node:process'

/**
 * Where session mutations land besides the session's own record.
 * The real binding writes through to the running process; the detached
 * binding keeps everything in memory so tests and embedders can run many
 * sessions side by side.
 */
export interface ProcessBinding {
  chdir: (directory: string) => void
  setEnv: (name: string, value: string) => void
}

export const nodeProcessBinding: ProcessBinding = {
  chdir(directory) {
    process.chdir(directory)
  },
  setEnv(name, value) {
    process.env[name] = value
  },
}

export const detachedProcessBinding: ProcessBinding = {
  chdir() {},
  setEnv() {},
}

/**
 * Snapshot of the current process environment with unset entries dropped.
 */
export function processEnvironment(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [name, value] of Object.entries(process.env)) {
    if (value !== undefined)
      env[name] = value
  }
  return env
}
