import { accessSync, constants as fsConstants } from 'node:fs'
import path from 'node:path'

function isExecutable(filePath: string): boolean {
  try {
    accessSync(filePath, fsConstants.X_OK)
    return true
  } catch {
    return false
  }
}

function executableNames(binary: string, env: Record<string, string | undefined>): string[] {
  if (process.platform !== 'win32' || path.extname(binary)) return [binary]
  const extensions = (env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean)
  return [binary, ...extensions.map((ext) => `${binary}${ext.toLowerCase()}`)]
}

export function resolveExecutableInPath(
  binary: string,
  env: Record<string, string | undefined>
): string | null {
  if (!binary) return null
  if (path.isAbsolute(binary)) {
    return isExecutable(binary) ? binary : null
  }
  if (binary.includes('/') || binary.includes(path.sep)) {
    const resolved = path.resolve(binary)
    return isExecutable(resolved) ? resolved : null
  }
  const pathEnv = env.PATH ?? env.Path ?? ''
  for (const entry of pathEnv.split(path.delimiter)) {
    if (!entry) continue
    for (const name of executableNames(binary, env)) {
      const candidate = path.join(entry, name)
      if (isExecutable(candidate)) return candidate
    }
  }
  return null
}

/**
 * First explicit candidate wins (callers order them flag, env, config); a bare binary
 * name falls back to a PATH lookup.
 */
export function resolveToolPath({
  binary,
  env,
  candidates = [],
}: {
  binary: string
  env: Record<string, string | undefined>
  candidates?: Array<string | null | undefined>
}): string | null {
  const explicit = candidates.map((value) => value?.trim() ?? '').find((value) => value.length > 0)
  if (explicit) return resolveExecutableInPath(explicit, env)
  return resolveExecutableInPath(binary, env)
}
