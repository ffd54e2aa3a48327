export class MalformedInputError extends Error {
  readonly line: number | undefined

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`)
    this.name = 'MalformedInputError'
    this.line = line
  }
}

export class InvalidThresholdError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidThresholdError'
  }
}
