/**
 * 디렉토리 트리 노드입니다. 파일은 저장하지 않고 디렉토리만 children으로 가집니다.
 */
export interface DirectoryNode {
    children: Record<string, DirectoryNode>;
}

/**
 * 파일 목록에서 도출한 레포지토리 구조 요약입니다.
 */
export interface RepoStructure {
    /** 확장자(소문자, 점 포함) → 파일 수. 확장자가 없으면 "" */
    fileTypeCounts: Record<string, number>;
    totalFiles: number;
    directoryTree: DirectoryNode;
}
