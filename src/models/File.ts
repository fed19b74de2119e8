/**
 * 디렉토리 목록 API에서 얻은 단일 항목입니다.
 * Crawler가 만들고 Structure Aggregator와 Sampler가 소비합니다.
 */
export interface FileEntry {
    /** 레포지토리 루트 기준 경로 */
    path: string;
    kind: "file" | "directory";
    /** 파일 크기 (bytes), 디렉토리는 0 */
    size: number;
    /** 원본 내용을 가져올 위치 (download_url) */
    contentLocator?: string;
}

/**
 * 프롬프트에 포함되는 파일 샘플입니다.
 * 내용을 가져오지 못한 경우에도 content는 항상 채워집니다 (placeholder).
 */
export interface SampledFile {
    path: string;
    content: string;
    size: number;
    /** 가져오기 실패 시 에러 설명 */
    error?: string;
}
