import type { ActivityMetrics, CommitItem, ContributorItem, IssueItem } from "../../models/Activity.js";
import type { RepositoryReference } from "../../models/Repository.js";
import type { FailurePolicy } from "../../pipeline/failurePolicy.js";
import type { GitHubSource } from "./GitHubSource.js";

const PAGE_SIZE = 100;

export interface ActivityOptions {
    /** 이 날짜(YYYY-MM-DD) 이후 커밋이 있으면 recentActivity = true */
    recentSince: string;
    /** 조회 개수 상한 (기본값: 100) */
    perPage?: number;
}

/**
 * 분석 시점 기준 N일 전 날짜를 YYYY-MM-DD로 반환합니다.
 */
export function recencyThreshold(now: Date, days: number): string {
    const cutoff = new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
    return cutoff.toISOString().slice(0, 10);
}

/**
 * 커밋 목록에서 날짜별 빈도표와 최근 활동 여부를 계산합니다.
 * 날짜 문자열은 고정 폭(YYYY-MM-DD)이므로 사전순 비교가 날짜 비교와 같습니다.
 */
export function summarizeCommits(
    commits: CommitItem[],
    recentSince: string
): Pick<ActivityMetrics, "commitDates" | "commitFrequency" | "recentActivity"> {
    const commitFrequency: Record<string, number> = {};

    for (const commit of commits) {
        if (!commit.authoredAt) continue;
        const date = commit.authoredAt.slice(0, 10);
        commitFrequency[date] = (commitFrequency[date] ?? 0) + 1;
    }

    const commitDates = Object.keys(commitFrequency);
    return {
        commitDates,
        commitFrequency,
        recentActivity: commitDates.some((date) => date >= recentSince),
    };
}

/**
 * 커밋, 기여자, 이슈를 각각 독립적으로 조회해 활동 지표를 만듭니다.
 * 어느 조회가 실패해도 해당 값만 0/빈 값으로 대체되며 항상 완전한 ActivityMetrics를 반환합니다.
 */
export async function fetchActivity(
    source: GitHubSource,
    ref: RepositoryReference,
    policy: FailurePolicy,
    options: ActivityOptions
): Promise<ActivityMetrics> {
    const perPage = options.perPage ?? PAGE_SIZE;

    const [commits, contributors, issues] = await Promise.all([
        policy.run("activity", "commits", () => source.listCommits(ref, perPage), (): CommitItem[] => []),
        policy.run("activity", "contributors", () => source.listContributors(ref, perPage), (): ContributorItem[] => []),
        policy.run("activity", "issues", () => source.listIssues(ref, perPage), (): IssueItem[] => []),
    ]);

    return {
        totalCommits: commits.length,
        totalContributors: contributors.length,
        totalIssues: issues.length,
        ...summarizeCommits(commits, options.recentSince),
    };
}
