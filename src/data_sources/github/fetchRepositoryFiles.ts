/**
 * Contents API로 레포지토리의 모든 파일 목록을 재귀적으로 가져옵니다.
 */
import type { FileEntry } from "../../models/File.js";
import type { RepositoryReference } from "../../models/Repository.js";
import type { FailurePolicy } from "../../pipeline/failurePolicy.js";
import type { GitHubSource } from "./GitHubSource.js";

/**
 * 디렉토리 레벨마다 한 번씩 목록을 요청하고, 하위 디렉토리는 깊이 우선으로 탐색합니다.
 * 결과는 목록 순서대로 이어 붙입니다.
 *
 * 특정 디렉토리 조회가 실패하면 그 서브트리만 빈 목록으로 대체되고
 * 형제 디렉토리 탐색은 계속됩니다.
 *
 * @param source 코드 호스팅 조회 구현
 * @param ref 대상 레포지토리
 * @param policy 실패 처리 정책 (listing)
 * @param dirPath 시작 경로 (기본값: 루트)
 */
export async function crawlRepository(
    source: GitHubSource,
    ref: RepositoryReference,
    policy: FailurePolicy,
    dirPath: string = ""
): Promise<FileEntry[]> {
    const entries = await policy.run(
        "listing",
        dirPath || "/",
        () => source.listDirectory(ref, dirPath),
        (): FileEntry[] => []
    );

    const files: FileEntry[] = [];

    for (const entry of entries) {
        if (entry.kind === "file") {
            files.push(entry);
        } else if (entry.kind === "directory") {
            const subFiles = await crawlRepository(source, ref, policy, entry.path);
            files.push(...subFiles);
        }
    }

    return files;
}
