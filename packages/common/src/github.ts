import { Octokit } from '@octokit/rest';
import type { IssueDocument, IssueReference } from '@refactor-gate/domain';

export interface IssueClient {
  getIssue(reference: IssueReference): Promise<IssueDocument>;
}

export class GitHubIssueClient implements IssueClient {
  private readonly octokit: Octokit;

  constructor(token?: string) {
    this.octokit = new Octokit(token ? { auth: token } : {});
  }

  async getIssue(reference: IssueReference): Promise<IssueDocument> {
    const response = await this.octokit.issues.get({
      owner: reference.owner,
      repo: reference.repo,
      issue_number: reference.number
    });

    return {
      title: response.data.title,
      body: response.data.body ?? null
    };
  }
}
