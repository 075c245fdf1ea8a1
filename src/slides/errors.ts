export class DecodeError extends Error {
  readonly path: string | null
  readonly detail: string

  constructor(detail: string, { path = null, cause }: { path?: string | null; cause?: unknown } = {}) {
    super(path ? `Unreadable frame ${path}: ${detail}` : `Unreadable frame: ${detail}`, { cause })
    this.name = 'DecodeError'
    this.path = path
    this.detail = detail
  }

  withPath(path: string): DecodeError {
    return new DecodeError(this.detail, { path, cause: this.cause ?? this })
  }
}

export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidConfigurationError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
