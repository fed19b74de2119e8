import { describeError, errorStatus, RepositoryUnavailableError } from "./errors.js";

/**
 * 파이프라인 단계별 실패 종류
 * - listing: 디렉토리 목록 조회 (서브트리 단위)
 * - activity: 커밋/기여자/이슈 조회 (각각 독립)
 * - content: 파일 내용 조회 (파일 단위)
 * - metadata: 레포지토리 메타데이터 조회 (필수)
 * - generation: LLM 호출
 */
export type FailureKind = "listing" | "activity" | "content" | "metadata" | "generation";

export interface Degradation {
    kind: FailureKind;
    /** 실패한 대상 (경로, 쿼리 이름 등) */
    target: string;
    message: string;
}

/**
 * 어떤 실패가 분석 전체를 중단시키는지 한 곳에서 결정합니다.
 * 치명적이지 않은 실패는 로그를 남기고 기본값으로 대체(degrade)됩니다.
 */
export interface FailurePolicy {
    readonly degradations: readonly Degradation[];
    isFatal(kind: FailureKind): boolean;
    run<T>(kind: FailureKind, target: string, task: () => Promise<T>, fallback: (error: unknown) => T): Promise<T>;
}

const DEFAULT_FATAL_KINDS: readonly FailureKind[] = ["metadata"];

export function createFailurePolicy(fatalKinds: readonly FailureKind[] = DEFAULT_FATAL_KINDS): FailurePolicy {
    const fatal = new Set<FailureKind>(fatalKinds);
    const degradations: Degradation[] = [];

    return {
        degradations,
        isFatal(kind) {
            return fatal.has(kind);
        },
        async run(kind, target, task, fallback) {
            try {
                return await task();
            } catch (error) {
                const message = describeError(error);
                if (fatal.has(kind)) {
                    console.error(`❌ ${kind} failed (${target}): ${message}`);
                    if (kind === "metadata") {
                        throw new RepositoryUnavailableError(message, errorStatus(error));
                    }
                    throw error;
                }
                console.warn(`⚠️ ${kind} degraded (${target}): ${message}`);
                degradations.push({ kind, target, message });
                return fallback(error);
            }
        },
    };
}
