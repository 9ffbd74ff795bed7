import { BridgeConfig, BridgeFailure, ChangeRequest, RepoLocation, SyncOutcome } from '../types';
import { emitBranchCreated, emitFileWritten, emitTagResult, recordCommit } from '../observability';
import { errorMessage, toFailure } from './errors';
import { RepositoryClient } from './ports';

/** Placeholder file that materializes an otherwise empty directory */
export const DIRECTORY_MARKER = '.gitkeep';

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

export function resolveLocation(request: Pick<ChangeRequest, 'repoName' | 'branch' | 'path' | 'filename'>): RepoLocation {
  const directory = request.path ? trimSlashes(request.path) : '';
  return {
    repoName: request.repoName,
    branch: request.branch,
    fullPath: directory ? `${directory}/${request.filename}` : request.filename,
  };
}

/**
 * Applies a validated change request to a repository
 *
 * Steps run in order and each one must succeed before the next:
 * 1. ensure the target branch (created from the default branch on demand)
 * 2. ensure every directory of the path (marker file per missing segment)
 * 3. create the file, or update it against its current revision
 * 4. optionally tag and release the branch tip; a failure here is logged
 *    and reported but leaves the committed file in place
 */
export class RepositorySyncEngine {
  constructor(
    private readonly client: RepositoryClient,
    private readonly config: Pick<BridgeConfig, 'defaultBranch'>
  ) {}

  async apply(request: ChangeRequest): Promise<SyncOutcome> {
    const location = resolveLocation(request);
    const { repoName, branch, fullPath } = location;

    let branchCreated: boolean;
    try {
      branchCreated = await this.ensureBranch(repoName, branch);
    } catch (error) {
      return this.fail(toFailure('BranchCreateFailed', `Could not ensure branch ${branch} in ${repoName}`, error));
    }

    let directoriesCreated: string[] = [];
    if (request.path) {
      try {
        directoriesCreated = await this.ensurePath(repoName, request.path, branch);
      } catch (error) {
        return this.fail(toFailure('PathMaterializeFailed', `Could not create path ${request.path} in ${repoName}`, error));
      }
    }

    let action: 'created' | 'updated';
    try {
      action = await this.writeFile(location, request.commitMessage, request.content);
    } catch (error) {
      return this.fail(toFailure('FileWriteFailed', `Could not write ${fullPath} to ${repoName}@${branch}`, error));
    }

    console.log(
      `[SyncEngine] ${fullPath} ${action} with message "${request.commitMessage}" on branch ${branch} of ${repoName}`
    );

    let tagCreated = false;
    let tagError: string | undefined;
    if (request.tagName) {
      tagError = await this.createTag(repoName, branch, request.tagName, request.commitMessage);
      tagCreated = tagError === undefined;
    }

    return {
      ok: true,
      result: {
        ...location,
        action,
        branchCreated,
        directoriesCreated,
        tagCreated,
        ...(tagError !== undefined ? { tagError } : {}),
      },
    };
  }

  /**
   * Create the branch from the default branch's tip if it does not exist
   *
   * @returns true when the branch was created
   */
  async ensureBranch(repo: string, branch: string): Promise<boolean> {
    if (await this.client.branchExists(repo, branch)) {
      return false;
    }

    await this.client.createBranch(repo, branch, this.config.defaultBranch);
    console.log(`[SyncEngine] Created branch ${branch} from ${this.config.defaultBranch} in ${repo}`);
    emitBranchCreated({ repo, branch, fromRef: this.config.defaultBranch });
    return true;
  }

  /**
   * Make sure every directory of `path` exists on `branch`
   *
   * Each segment is checked on its own: a missing deep directory says
   * nothing about its parents.
   *
   * @returns the directories that had to be created, shallowest first
   */
  async ensurePath(repo: string, path: string, branch: string): Promise<string[]> {
    const directory = trimSlashes(path);
    if (!directory || (await this.client.pathExists(repo, directory, branch))) {
      return [];
    }

    const created: string[] = [];
    let current = '';
    for (const segment of directory.split('/')) {
      current = current ? `${current}/${segment}` : segment;
      if (await this.client.pathExists(repo, current, branch)) {
        continue;
      }
      await this.client.createFile(repo, `${current}/${DIRECTORY_MARKER}`, `Create directory ${current}`, '', branch);
      recordCommit({ repo, kind: 'directory' });
      created.push(current);
    }

    console.log(`[SyncEngine] Created directories in ${repo}@${branch}: ${created.join(', ')}`);
    return created;
  }

  /**
   * Update the file against its current revision, or create it.
   * Content identity is not compared; an unchanged body still commits.
   */
  async writeFile(location: RepoLocation, message: string, content: string): Promise<'created' | 'updated'> {
    const { repoName, branch, fullPath } = location;
    const existing = await this.client.getFile(repoName, fullPath, branch);

    let action: 'created' | 'updated';
    if (existing.found) {
      await this.client.updateFile(repoName, fullPath, message, content, existing.file.revision, branch);
      action = 'updated';
    } else {
      await this.client.createFile(repoName, fullPath, message, content, branch);
      action = 'created';
    }

    recordCommit({ repo: repoName, kind: 'file' });
    emitFileWritten({ repo: repoName, branch, path: fullPath, action });
    return action;
  }

  /**
   * Tag the tip of `branch` and publish a release for it
   *
   * @returns undefined on success, otherwise the error text
   */
  async createTag(repo: string, branch: string, tag: string, message: string): Promise<string | undefined> {
    try {
      const head = await this.client.getBranchHead(repo, branch);
      await this.client.createTagAndRelease(repo, tag, message, head);
      console.log(`[SyncEngine] Tag ${tag} created on ${repo}@${branch} (${head})`);
      emitTagResult({ repo, tag, success: true });
      return undefined;
    } catch (error) {
      const reason = errorMessage(error) || 'unknown error';
      console.error(`[SyncEngine] TagCreateFailed: could not create tag ${tag} in ${repo}: ${reason}`);
      emitTagResult({ repo, tag, success: false, error: reason });
      return reason;
    }
  }

  private fail(failure: BridgeFailure): SyncOutcome {
    console.error(`[SyncEngine] ${failure.kind}: ${failure.message}`);
    return { ok: false, failure };
  }
}
