import type { CommitItem, ContributorItem, IssueItem } from "../../models/Activity.js";
import type { FileEntry } from "../../models/File.js";
import type { RepositoryInfo, RepositoryReference } from "../../models/Repository.js";

/**
 * 파이프라인이 사용하는 코드 호스팅 조회 인터페이스입니다.
 * 구현체는 생성 시점에 주입되며, 테스트에서는 인메모리 구현으로 대체합니다.
 * 모든 메서드는 실패 시 예외를 던지고, degrade 여부는 호출 측의 FailurePolicy가 결정합니다.
 */
export interface GitHubSource {
    getRepository(ref: RepositoryReference): Promise<RepositoryInfo>;
    /** 한 디렉토리 레벨의 항목 목록 (path가 ""이면 루트) */
    listDirectory(ref: RepositoryReference, path: string): Promise<FileEntry[]>;
    /** 원본 파일 내용. 텍스트가 아닌 구조화된 응답은 파싱된 값 그대로 반환 */
    fetchRawContent(contentLocator: string): Promise<unknown>;
    listCommits(ref: RepositoryReference, perPage: number): Promise<CommitItem[]>;
    listContributors(ref: RepositoryReference, perPage: number): Promise<ContributorItem[]>;
    listIssues(ref: RepositoryReference, perPage: number): Promise<IssueItem[]>;
}
