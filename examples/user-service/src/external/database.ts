export type DatabaseErrorKind = "connection_failed" | "query_failed" | "row_not_found"

const MESSAGES: Record<DatabaseErrorKind, string> = {
  connection_failed: "Database connection failed",
  query_failed: "Query execution failed",
  row_not_found: "Row not found",
}

/** Stand-in for a driver's own error type. */
export class DatabaseError extends Error {
  readonly kind: DatabaseErrorKind

  constructor(kind: DatabaseErrorKind, options?: ErrorOptions) {
    super(MESSAGES[kind], options)
    this.name = "DatabaseError"
    this.kind = kind
  }
}

export type UserRecord = {
  username: string
  displayName: string
}

export interface UserDatabase {
  /** @throws DatabaseError */
  findUser(username: string): UserRecord | undefined
}

export class InMemoryUserDatabase implements UserDatabase {
  private readonly rows: Map<string, UserRecord>

  /**
   * @param failure - thrown from every query, to simulate an unavailable or
   * misbehaving database
   */
  constructor(
    users: Iterable<UserRecord> = [],
    private readonly failure?: DatabaseError,
  ) {
    this.rows = new Map(Array.from(users, (user) => [user.username, user]))
  }

  findUser(username: string): UserRecord | undefined {
    if (this.failure) throw this.failure

    return this.rows.get(username)
  }
}
