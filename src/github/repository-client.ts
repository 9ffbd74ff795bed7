import { FileLookup, RepositoryClient } from '../bridge/ports';
import { GitHubAuth, ensureOk } from './auth';

interface GitRef {
  ref: string;
  object: { sha: string; type: string };
}

interface ContentsFile {
  type: 'file' | 'dir' | 'symlink' | 'submodule';
  path: string;
  sha: string;
  content?: string;
  encoding?: string;
}

/**
 * Encode a repository path or ref name, keeping `/` separators
 */
export function encodePath(path: string): string {
  return path
    .split('/')
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join('/');
}

function refQuery(ref: string): string {
  return `?ref=${encodeURIComponent(ref)}`;
}

/**
 * RepositoryClient backed by the GitHub REST API (contents, git refs,
 * git tags and releases endpoints).
 */
export class GitHubRepositoryClient implements RepositoryClient {
  constructor(private readonly auth: GitHubAuth) {}

  async branchExists(repo: string, branch: string): Promise<boolean> {
    const resp = await this.auth.request(repo, `/branches/${encodePath(branch)}`);
    if (resp.status === 404) {
      return false;
    }
    await ensureOk(resp, `Failed to get branch ${branch}`);
    return true;
  }

  async getBranchHead(repo: string, branch: string): Promise<string> {
    const resp = await ensureOk(
      await this.auth.request(repo, `/git/ref/heads/${encodePath(branch)}`),
      `Failed to get ref ${branch}`
    );
    const data = (await resp.json()) as GitRef;
    return data.object.sha;
  }

  async createBranch(repo: string, branch: string, fromRef: string): Promise<void> {
    const sha = await this.getBranchHead(repo, fromRef);
    await ensureOk(
      await this.auth.request(repo, '/git/refs', {
        method: 'POST',
        body: { ref: `refs/heads/${branch}`, sha },
      }),
      `Failed to create branch ${branch}`
    );
  }

  async pathExists(repo: string, path: string, ref: string): Promise<boolean> {
    const resp = await this.auth.request(repo, `/contents/${encodePath(path)}${refQuery(ref)}`);
    if (resp.status === 404) {
      return false;
    }
    await ensureOk(resp, `Failed to get contents of ${path}`);
    return true;
  }

  async getFile(repo: string, path: string, ref: string): Promise<FileLookup> {
    const resp = await this.auth.request(repo, `/contents/${encodePath(path)}${refQuery(ref)}`);
    if (resp.status === 404) {
      return { found: false };
    }
    await ensureOk(resp, `Failed to get file ${path}`);

    const data = (await resp.json()) as ContentsFile | ContentsFile[];
    if (Array.isArray(data) || data.type !== 'file') {
      throw new Error(`${path} is not a file`);
    }

    const content =
      data.content && data.encoding === 'base64' ? Buffer.from(data.content, 'base64').toString('utf8') : '';
    return { found: true, file: { revision: data.sha, content } };
  }

  async createFile(repo: string, path: string, message: string, content: string, branch: string): Promise<void> {
    await this.putContents(repo, path, { message, content, branch });
  }

  async updateFile(
    repo: string,
    path: string,
    message: string,
    content: string,
    revision: string,
    branch: string
  ): Promise<void> {
    await this.putContents(repo, path, { message, content, branch, sha: revision });
  }

  async createTagAndRelease(repo: string, tag: string, message: string, targetCommit: string): Promise<void> {
    const tagResp = await ensureOk(
      await this.auth.request(repo, '/git/tags', {
        method: 'POST',
        body: { tag, message, object: targetCommit, type: 'commit' },
      }),
      `Failed to create tag object ${tag}`
    );
    const tagObject = (await tagResp.json()) as { sha: string };

    await ensureOk(
      await this.auth.request(repo, '/git/refs', {
        method: 'POST',
        body: { ref: `refs/tags/${tag}`, sha: tagObject.sha },
      }),
      `Failed to create tag ref ${tag}`
    );

    await ensureOk(
      await this.auth.request(repo, '/releases', {
        method: 'POST',
        body: { tag_name: tag, name: tag, body: message },
      }),
      `Failed to create release ${tag}`
    );
  }

  private async putContents(
    repo: string,
    path: string,
    params: { message: string; content: string; branch: string; sha?: string }
  ): Promise<void> {
    await ensureOk(
      await this.auth.request(repo, `/contents/${encodePath(path)}`, {
        method: 'PUT',
        body: {
          message: params.message,
          content: Buffer.from(params.content).toString('base64'),
          branch: params.branch,
          ...(params.sha ? { sha: params.sha } : {}),
        },
      }),
      params.sha ? `Failed to update ${path}` : `Failed to create ${path}`
    );
  }
}
