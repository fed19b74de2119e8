import type { FileEntry, SampledFile } from "../../models/File.js";
import type { GitHubSource } from "../../data_sources/github/GitHubSource.js";
import type { FailurePolicy } from "../failurePolicy.js";
import { describeError } from "../errors.js";
import { fileExtension } from "./analyzeStructure.js";

export const MAX_SAMPLED_FILES = 50;
export const MAX_FILE_SIZE = 500000; // 500KB

export const TOO_LARGE_PLACEHOLDER = "File too large to analyze";
export const FETCH_ERROR_PLACEHOLDER = "Error fetching content";

const CODE_EXTENSIONS = new Set([
    // 주요 프로그래밍 언어
    ".js", ".ts", ".jsx", ".tsx", ".py", ".rb", ".java", ".c", ".cpp", ".cs", ".go", ".rs", ".php",
    ".swift", ".kt", ".scala", ".sh", ".bash", ".pl", ".lua", ".sol", ".ex", ".exs", ".erl", ".hrl",
    // 웹
    ".html", ".css", ".scss", ".sass", ".less",
    // 설정
    ".json", ".yml", ".yaml", ".toml", ".xml", ".ini",
    // 문서
    ".md", ".txt",
]);

// 확장자로는 구분되지 않는 설정 파일
const CODE_FILE_NAMES = new Set([".gitignore", ".env.example"]);

/**
 * 분석 대상이 되는 "코드성" 파일인지 확장자 허용 목록으로 판단합니다.
 */
export function isCodeFile(path: string): boolean {
    const base = path.slice(path.lastIndexOf("/") + 1).toLowerCase();
    return CODE_FILE_NAMES.has(base) || CODE_EXTENSIONS.has(fileExtension(path));
}

/**
 * 가져온 본문을 문자열로 정규화합니다. 구조화된 응답은 JSON으로 직렬화합니다.
 */
function toText(body: unknown): string {
    if (typeof body === "string") return body;
    return JSON.stringify(body) ?? "";
}

export interface SampleOptions {
    /** 최대 샘플 수 (기본값: 50) */
    maxFiles?: number;
    /** 이보다 큰 파일은 가져오지 않음 (기본값: 500KB) */
    maxFileSize?: number;
    /** 동시 요청 수 (기본값: 5) */
    concurrency?: number;
}

async function sampleFile(
    source: GitHubSource,
    file: FileEntry,
    policy: FailurePolicy,
    maxFileSize: number
): Promise<SampledFile> {
    if (file.size > maxFileSize) {
        return { path: file.path, content: TOO_LARGE_PLACEHOLDER, size: file.size };
    }

    return policy.run(
        "content",
        file.path,
        async (): Promise<SampledFile> => {
            if (!file.contentLocator) {
                throw new Error("No download URL");
            }
            const body = await source.fetchRawContent(file.contentLocator);
            return { path: file.path, content: toText(body), size: file.size };
        },
        (error): SampledFile => ({
            path: file.path,
            content: FETCH_ERROR_PLACEHOLDER,
            error: describeError(error),
            size: file.size,
        })
    );
}

/**
 * 코드성 파일 중 앞에서부터 최대 50개를 골라 내용을 가져옵니다.
 *
 * - 500KB 초과: 요청 없이 placeholder
 * - 가져오기 성공: 본문 (구조화 응답은 JSON 직렬화)
 * - 가져오기 실패: placeholder + 에러 설명, 나머지 파일은 계속 처리
 *
 * 배치 단위로 동시에 요청하되 결과 순서는 입력 순서를 유지합니다.
 */
export async function sampleContents(
    source: GitHubSource,
    files: FileEntry[],
    policy: FailurePolicy,
    options: SampleOptions = {}
): Promise<SampledFile[]> {
    const {
        maxFiles = MAX_SAMPLED_FILES,
        maxFileSize = MAX_FILE_SIZE,
        concurrency = 5,
    } = options;

    const selected = files.filter((file) => isCodeFile(file.path)).slice(0, maxFiles);
    const samples: SampledFile[] = [];
    const batchSize = Math.max(1, concurrency);

    for (let i = 0; i < selected.length; i += batchSize) {
        const batch = selected.slice(i, i + batchSize);
        const batchResults = await Promise.all(
            batch.map((file) => sampleFile(source, file, policy, maxFileSize))
        );
        samples.push(...batchResults);
    }

    const failed = samples.filter((sample) => sample.error !== undefined).length;
    console.log(`   → ${samples.length} files sampled (${failed} failed)`);
    return samples;
}
