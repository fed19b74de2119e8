/**
 * 분석 실행을 중단시키는 에러입니다.
 * 그 밖의 실패는 failure policy에서 degrade 처리됩니다.
 */
export class AnalysisError extends Error {
    readonly statusCode: number;

    constructor(message: string, statusCode: number = 500) {
        super(message);
        this.name = 'AnalysisError';
        this.statusCode = statusCode;
    }
}

/** URL에서 owner/name을 찾지 못함. 사용자가 고칠 수 있는 입력 오류이며 재시도하지 않음 */
export class InvalidReferenceError extends AnalysisError {
    readonly locator: string;

    constructor(locator: string) {
        super('Invalid GitHub repository URL', 400);
        this.name = 'InvalidReferenceError';
        this.locator = locator;
    }
}

/** 필수인 레포지토리 메타데이터 조회 실패 */
export class RepositoryUnavailableError extends AnalysisError {
    readonly status?: number;

    constructor(message: string, status?: number) {
        super(message, 502);
        this.name = 'RepositoryUnavailableError';
        this.status = status;
    }
}

export class AnalysisTimeoutError extends AnalysisError {
    readonly timeoutMs: number;

    constructor(timeoutMs: number) {
        super(`Analysis timed out after ${Math.round(timeoutMs / 1000)} seconds`, 504);
        this.name = 'AnalysisTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

/**
 * throw된 값(Octokit RequestError, SDK 에러, 문자열 등)에서 메시지를 꺼냅니다.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return String(error);
}

/**
 * Octokit / SDK 에러가 가진 HTTP status (없으면 undefined)
 */
export function errorStatus(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error) {
        const { status } = error;
        return typeof status === 'number' ? status : undefined;
    }
    return undefined;
}
