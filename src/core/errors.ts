/**
 * Error types raised by the fetch clients, the scrape path and config loading.
 * Transport errors (DNS, reset, timeout abort) are native fetch errors and are not wrapped.
 */

/** Non-2xx response from either source */
export class HttpStatusError extends Error {
  readonly status: number
  readonly statusText: string
  readonly url: string

  constructor(status: number, statusText: string, url: string) {
    super(`HTTP ${status}: ${statusText} (${url})`)
    this.name = 'HttpStatusError'
    this.status = status
    this.statusText = statusText
    this.url = url
  }
}

export type PayloadStage = 'script' | 'variable'

/**
 * The page was fetched but the embedded data could not be found on it.
 * `stage` says whether no script carried the marker, or the marker script had no parsable assignment.
 */
export class PayloadNotLocatedError extends Error {
  readonly variable: string
  readonly stage: PayloadStage

  constructor(variable: string, stage: PayloadStage) {
    super(
      stage === 'script'
        ? `Could not locate ${variable} in page scripts`
        : `Failed to extract ${variable} assignment from its script`
    )
    this.name = 'PayloadNotLocatedError'
    this.variable = variable
    this.stage = stage
  }
}

/** Payload located and parsed, but not the shape the resource expects */
export class PayloadShapeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PayloadShapeError'
  }
}

export class ConfigError extends Error {
  readonly variable: string

  constructor(variable: string, message: string) {
    super(message)
    this.name = 'ConfigError'
    this.variable = variable
  }
}

/** Bad command-line input; the CLI prints it with the usage text */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}
