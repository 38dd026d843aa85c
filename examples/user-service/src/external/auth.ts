/** Stand-in for an identity provider SDK's error type. */
export class AuthError extends Error {
  readonly detail: string

  constructor(detail: string, options?: ErrorOptions) {
    super(`Authentication error: ${detail}`, options)
    this.name = "AuthError"
    this.detail = detail
  }
}

export interface AuthService {
  /** @throws AuthError */
  verifyCredentials(username: string, token: string): void
}

export class TokenAuthService implements AuthService {
  private readonly tokens: ReadonlyMap<string, string>

  constructor(tokens: Record<string, string>) {
    this.tokens = new Map(Object.entries(tokens))
  }

  verifyCredentials(username: string, token: string): void {
    const expected = this.tokens.get(username)

    if (expected === undefined) {
      throw new AuthError("No credentials registered")
    }

    if (expected !== token) {
      throw new AuthError("Invalid token", { cause: new Error("token signature mismatch") })
    }
  }
}
