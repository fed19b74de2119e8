/**
 * 커밋 목록 API 응답에서 활동 지표 계산에 필요한 필드만 추린 형태입니다.
 */
export interface CommitItem {
    sha: string;
    /** 커밋 작성 시각 (ISO 8601), 알 수 없으면 null */
    authoredAt: string | null;
}

export interface ContributorItem {
    login: string | null;
    contributions: number;
}

export interface IssueItem {
    number: number;
    state: string;
}

/**
 * 커밋/기여자/이슈 조회로 계산한 활동 지표입니다.
 * 일부 조회가 실패해도 모든 필드가 채워진 상태로 반환됩니다.
 */
export interface ActivityMetrics {
    totalCommits: number;
    totalContributors: number;
    totalIssues: number;
    /** 커밋이 있었던 날짜 (YYYY-MM-DD), 처음 등장한 순서 */
    commitDates: string[];
    /** 날짜별 커밋 수 */
    commitFrequency: Record<string, number>;
    recentActivity: boolean;
}
