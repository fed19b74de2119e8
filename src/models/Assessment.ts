import type { ActivityMetrics } from "./Activity.js";
import type { RepositoryInfo, RepositoryReference } from "./Repository.js";
import type { RepoStructure } from "./Structure.js";

export const RATING_LABELS = [
    "Code Quality",
    "Completeness",
    "Security",
    "Originality",
    "Activity",
] as const;

export type RatingLabel = (typeof RATING_LABELS)[number];

/** "3/5" 형태의 점수 문자열 */
export type RatingScore = `${number}/5`;

/**
 * Result Extractor에 전달되는 분석 결과 단위입니다.
 */
export interface AnalysisReport {
    repository: RepositoryReference;
    info: RepositoryInfo;
    structure: RepoStructure;
    activity: ActivityMetrics;
    /** LLM이 생성한 원문 (실패 시 에러 메시지 텍스트) */
    rawGeneratedText: string;
    /** 실제로 프롬프트에 포함된 파일 수 */
    sampledFileCount: number;
}

/**
 * 생성 텍스트에서 추출한 구조화된 평가입니다. 모든 필드는 best-effort입니다.
 */
export interface StructuredAssessment {
    verdict?: string;
    ratings: Partial<Record<RatingLabel, RatingScore>>;
    narrative: string;
}

export interface AnalysisResult {
    report: AnalysisReport;
    assessment: StructuredAssessment;
}
