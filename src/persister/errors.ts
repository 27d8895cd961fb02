/**
 * Error raised when a request body cannot be decoded into key-value
 * objects. Nothing has been written when this is thrown.
 */
export class MalformedInputError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'MalformedInputError'
  }
}

/**
 * Error raised when no free surrogate id was found within the attempt cap.
 */
export class SurrogateIdExhaustedError extends Error {
  constructor(public readonly attempts: number) {
    super(`no unused surrogate id found after ${attempts} attempts`)
    this.name = 'SurrogateIdExhaustedError'
  }
}

export interface RollbackFailure {
  surrogateId: string
  error: unknown
}

/**
 * Error raised when a record of a batch could not be written. Records of
 * the batch written before it have been deleted again; any that could not
 * be are listed in `rollbackFailures`.
 */
export class BatchWriteError extends Error {
  constructor(
    public readonly recordIndex: number,
    public readonly batchSize: number,
    cause: unknown,
    public readonly rollbackFailures: RollbackFailure[] = []
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    const rollbackNote =
      rollbackFailures.length > 0
        ? `; rollback failed for ${rollbackFailures.length} of the records written before it`
        : ''
    super(
      `unable to write record ${recordIndex + 1} of ${batchSize}: ${reason}${rollbackNote}`,
      { cause }
    )
    this.name = 'BatchWriteError'
  }
}

/**
 * Error raised when a value read back from the store is not a record
 * written by this service.
 */
export class StoredRecordError extends Error {
  constructor(
    public readonly surrogateId: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`stored value under "${surrogateId}": ${message}`, options)
    this.name = 'StoredRecordError'
  }
}
