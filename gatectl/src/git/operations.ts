import { simpleGit, type SimpleGit } from "simple-git";

/**
 * Release tagging on the image repository, through simple-git.
 */
export class GitOperations {
  private git: SimpleGit;

  constructor(repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  async tagExists(name: string): Promise<boolean> {
    const tags = await this.git.tags();
    return tags.all.includes(name);
  }

  /** Create an annotated tag on HEAD. */
  async createTag(name: string, message?: string): Promise<void> {
    await this.git.tag(["-a", name, "-m", message ?? name]);
  }
}
