export class DBusError extends Error {
  readonly errorName: string

  constructor(errorName: string, message: string) {
    super(message)
    this.name = "DBusError"
    this.errorName = errorName
  }
}

/** Raised for a malformed type signature. Never recovered from. */
export class SignatureError extends Error {
  readonly signature: string

  constructor(signature: string, message: string) {
    super(message)
    this.name = "SignatureError"
    this.signature = signature
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "UsageError"
  }
}

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ArgumentError"
  }
}
