import { Octokit } from "@octokit/rest";
import type { CommitItem, ContributorItem, IssueItem } from "../../models/Activity.js";
import type { FileEntry } from "../../models/File.js";
import type { RepositoryInfo, RepositoryReference } from "../../models/Repository.js";
import type { GitHubSource } from "./GitHubSource.js";

/**
 * Octokit 기반 GitHubSource 구현입니다.
 * 토큰이 없으면 비인증 요청으로 동작합니다 (rate limit이 더 엄격함).
 */
export class OctokitGitHubSource implements GitHubSource {
    private readonly octokit: Octokit;

    constructor(octokit: Octokit) {
        this.octokit = octokit;
    }

    static fromToken(token?: string): OctokitGitHubSource {
        return new OctokitGitHubSource(new Octokit(token ? { auth: token } : {}));
    }

    async getRepository({ owner, name }: RepositoryReference): Promise<RepositoryInfo> {
        const { data } = await this.octokit.repos.get({ owner, repo: name });
        return {
            name: data.name,
            fullName: data.full_name,
            description: data.description,
            stars: data.stargazers_count,
            forks: data.forks_count,
            updatedAt: data.updated_at,
            htmlUrl: data.html_url,
            defaultBranch: data.default_branch,
            owner: {
                login: data.owner.login,
                avatarUrl: data.owner.avatar_url || null,
                htmlUrl: data.owner.html_url || null,
            },
        };
    }

    async listDirectory({ owner, name }: RepositoryReference, path: string): Promise<FileEntry[]> {
        const { data } = await this.octokit.repos.getContent({ owner, repo: name, path });

        // 파일 경로를 넘긴 경우 단일 객체가 반환됨
        if (!Array.isArray(data)) {
            return [];
        }

        const entries: FileEntry[] = [];
        for (const item of data) {
            if (item.type === "file") {
                entries.push({
                    path: item.path,
                    kind: "file",
                    size: item.size ?? 0,
                    contentLocator: item.download_url ?? undefined,
                });
            } else if (item.type === "dir") {
                entries.push({ path: item.path, kind: "directory", size: 0 });
            }
            // symlink, submodule은 건너뜀
        }
        return entries;
    }

    async fetchRawContent(contentLocator: string): Promise<unknown> {
        // 절대 URL은 baseUrl 없이 그대로 요청됨. text/* 응답은 문자열, JSON 응답은 파싱된 값
        const response = await this.octokit.request(contentLocator);
        const body: unknown = response.data;
        return body;
    }

    async listCommits({ owner, name }: RepositoryReference, perPage: number): Promise<CommitItem[]> {
        const { data } = await this.octokit.repos.listCommits({ owner, repo: name, per_page: perPage });
        return data.map((item) => ({
            sha: item.sha,
            authoredAt: item.commit.author?.date ?? null,
        }));
    }

    async listContributors({ owner, name }: RepositoryReference, perPage: number): Promise<ContributorItem[]> {
        const { data } = await this.octokit.repos.listContributors({ owner, repo: name, per_page: perPage });
        // 빈 레포지토리는 204 (본문 없음)
        if (!Array.isArray(data)) {
            return [];
        }
        return data.map((item) => ({
            login: item.login ?? null,
            contributions: item.contributions,
        }));
    }

    async listIssues({ owner, name }: RepositoryReference, perPage: number): Promise<IssueItem[]> {
        const { data } = await this.octokit.issues.listForRepo({
            owner,
            repo: name,
            state: "all",
            per_page: perPage,
        });
        return data.map((item) => ({
            number: item.number,
            state: item.state,
        }));
    }
}
