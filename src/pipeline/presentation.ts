import type { AnalysisResult } from "../models/Assessment.js";
import { isRepositoryUrl } from "../data_sources/github/parseRepositoryUrl.js";
import { buildDisplayReport, type DisplayReport } from "../service/analysis/formatForDisplay.js";
import { analyzeRepository, type AnalysisDependencies } from "./runAnalysis.js";
import { AnalysisError, AnalysisTimeoutError, describeError, InvalidReferenceError } from "./errors.js";

export const DEFAULT_ANALYSIS_TIMEOUT_MS = 300000;
export const INVALID_URL_MESSAGE = "Please provide a valid GitHub repository URL.";

export type PresentationResult =
    | { ok: true; result: AnalysisResult; display: DisplayReport }
    | { ok: false; error: string; statusCode: number };

export interface PresentationOptions {
    timeoutMs?: number;
    segmentLimit?: number;
}

/**
 * 작업이 deadline 안에 끝나지 않으면 AnalysisTimeoutError로 reject합니다.
 * 원래 작업은 취소되지 않고 계속 실행되며, 그 결과는 버려집니다.
 */
export async function withDeadline<T>(task: Promise<T>, timeoutMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => reject(new AnalysisTimeoutError(timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([task, deadline]);
    } finally {
        clearTimeout(timer);
    }
}

function toErrorMessage(error: unknown): { error: string; statusCode: number } {
    if (error instanceof InvalidReferenceError) {
        return { error: INVALID_URL_MESSAGE, statusCode: error.statusCode };
    }
    if (error instanceof AnalysisTimeoutError) {
        return { error: error.message, statusCode: error.statusCode };
    }
    const statusCode = error instanceof AnalysisError ? error.statusCode : 500;
    return { error: `Error analyzing repository: ${describeError(error)}`, statusCode };
}

/**
 * 프레젠테이션 계층의 단일 진입점입니다.
 * 완성된 보고서(일부 지표가 degrade되었을 수 있음) 또는 사람이 읽을 수 있는 에러 문자열 하나를 반환합니다.
 */
export async function analyzeForPresentation(
    locator: string,
    deps: AnalysisDependencies,
    options: PresentationOptions = {}
): Promise<PresentationResult> {
    if (!isRepositoryUrl(locator)) {
        return { ok: false, error: INVALID_URL_MESSAGE, statusCode: 400 };
    }

    const timeoutMs = options.timeoutMs ?? DEFAULT_ANALYSIS_TIMEOUT_MS;

    try {
        const result = await withDeadline(analyzeRepository(locator, deps), timeoutMs);
        const display = buildDisplayReport(result, { url: locator, segmentLimit: options.segmentLimit });
        return { ok: true, result, display };
    } catch (error) {
        const failure = toErrorMessage(error);
        console.error(`❌ ${failure.error}`);
        return { ok: false, ...failure };
    }
}
