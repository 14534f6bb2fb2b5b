/**
 * Allow list of repositories.
 *
 * A token may be an owner, an `owner/repo` slug or a URL containing one.
 * `owner/repo` is allowed when the list is empty, or when it and some token
 * contain one another, ignoring case. An owner alone admits all of that
 * owner's repositories, and so does any other shared substring.
 */
export class RepositoryWhitelist {
  private readonly tokens: readonly string[]

  public constructor(tokens: readonly string[]) {
    this.tokens = tokens
      .map((token) => token.trim().toLowerCase())
      .filter((token) => token.length > 0)
  }

  get allowsEverything(): boolean {
    return this.tokens.length === 0
  }

  allows(owner: string, repository: string): boolean {
    if (this.allowsEverything) return true

    const target = `${owner}/${repository}`.toLowerCase()

    return this.tokens.some((token) => token.includes(target) || target.includes(token))
  }
}
