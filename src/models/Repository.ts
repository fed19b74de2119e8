/**
 * 분석 대상 레포지토리 식별자입니다. 파싱 이후 변경되지 않습니다.
 */
export interface RepositoryReference {
    /** 레포지토리 소유자 (user 또는 organization) */
    readonly owner: string;
    /** 레포지토리 이름 (.git 접미사 제거됨) */
    readonly name: string;
}

/**
 * URL 파싱 실패 시 반환되는 "not found" 쌍입니다.
 */
export interface UnresolvedReference {
    readonly owner: null;
    readonly name: null;
}

export type ParsedReference = RepositoryReference | UnresolvedReference;

/**
 * GitHub 레포지토리 메타데이터 중 분석과 표시에 쓰이는 필드입니다.
 */
export interface RepositoryInfo {
    name: string;
    fullName: string;
    description: string | null;
    /** stargazers_count */
    stars: number;
    /** forks_count */
    forks: number;
    /** 마지막 업데이트 시각 (ISO 8601) */
    updatedAt: string;
    htmlUrl: string;
    defaultBranch: string;
    owner: {
        login: string;
        avatarUrl: string | null;
        htmlUrl: string | null;
    };
}
