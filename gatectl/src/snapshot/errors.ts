/** The installed-package listing could not be obtained from the artifact. */
export class SnapshotUnavailableError extends Error {
  readonly domain: string | undefined;

  constructor(message: string, domain?: string) {
    super(message);
    this.name = "SnapshotUnavailableError";
    this.domain = domain;
  }
}
