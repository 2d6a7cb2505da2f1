/**
 * Deterministic GitHub URLs for a release repository.
 */

/** Repository whose releases carry the squirrel binaries. */
export const DEFAULT_REPOSITORY = "squirrelscan/squirrelscan";

const GITHUB_API = "https://api.github.com";
const GITHUB = "https://github.com";

export class ReleaseUrls {
  /**
   * @param repository - GitHub `owner/name`
   */
  constructor(readonly repository: string = DEFAULT_REPOSITORY) {}

  /** Newest-first release listing. */
  listing(): string {
    return `${GITHUB_API}/repos/${this.repository}/releases`;
  }

  manifest(tag: string): string {
    return this.download(tag, "manifest.json");
  }

  artifact(tag: string, filename: string): string {
    return this.download(tag, filename);
  }

  /** Human-facing page of one release. */
  releasePage(tag: string): string {
    return `${GITHUB}/${this.repository}/releases/tag/${encodeURIComponent(tag)}`;
  }

  /** Human-facing list of all releases. */
  releasesPage(): string {
    return `${GITHUB}/${this.repository}/releases`;
  }

  private download(tag: string, filename: string): string {
    return `${GITHUB}/${this.repository}/releases/download/${encodeURIComponent(tag)}/${encodeURIComponent(filename)}`;
  }
}
