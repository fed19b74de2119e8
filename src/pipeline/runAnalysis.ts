import type { AnalysisResult } from "../models/Assessment.js";
import type { GitHubSource } from "../data_sources/github/GitHubSource.js";
import { isResolved, parseRepositoryUrl } from "../data_sources/github/parseRepositoryUrl.js";
import { crawlRepository } from "../data_sources/github/fetchRepositoryFiles.js";
import { fetchActivity, recencyThreshold } from "../data_sources/github/fetchActivity.js";
import { analyzeStructure } from "./steps/analyzeStructure.js";
import { sampleContents } from "./steps/sampleContents.js";
import { generateReport } from "../service/analysis/generateReport.js";
import { extractAssessment } from "../service/analysis/extractAssessment.js";
import type { TextGenerator } from "../service/analysis/textGenerator.js";
import { createFailurePolicy, type FailurePolicy } from "./failurePolicy.js";
import { describeError, errorStatus, InvalidReferenceError, RepositoryUnavailableError } from "./errors.js";

export interface AnalysisDependencies {
    source: GitHubSource;
    generator: TextGenerator;
    /** 생략 시 generator 기본 모델 */
    model?: string;
    /** recentActivity 판단 기준 일수 (기본값: 365) */
    recentActivityDays?: number;
    /** 파일 내용 동시 요청 수 (기본값: 5) */
    concurrency?: number;
    now?: () => Date;
    policy?: FailurePolicy;
}

/**
 * 레포지토리 분석 파이프라인을 실행합니다.
 * 1. URL 파싱 (실패 시 InvalidReferenceError)
 * 2. 레포지토리 메타데이터 조회 (실패 시 RepositoryUnavailableError)
 * 3. 파일 목록 수집 (서브트리 단위 degrade)
 * 4. 구조 분석
 * 5. 활동 지표 조회 (쿼리 단위 degrade)
 * 6. 코드 파일 샘플링 (파일 단위 degrade)
 * 7. LLM 평가 생성 (실패 시 에러 텍스트)
 * 8. 점수/판정/본문 추출
 */
export async function analyzeRepository(locator: string, deps: AnalysisDependencies): Promise<AnalysisResult> {
    const { source, generator } = deps;
    const policy = deps.policy ?? createFailurePolicy();
    const now = deps.now ?? (() => new Date());

    console.log(`🚀 Starting analysis of repository: ${locator}`);

    const parsed = parseRepositoryUrl(locator);
    if (!isResolved(parsed)) {
        throw new InvalidReferenceError(locator);
    }
    const repository = { owner: parsed.owner, name: parsed.name };

    const info = await policy.run(
        "metadata",
        `${repository.owner}/${repository.name}`,
        () => source.getRepository(repository),
        (error) => {
            throw new RepositoryUnavailableError(describeError(error), errorStatus(error));
        }
    );
    console.log(`📌 ${info.fullName}: ⭐ ${info.stars} 🍴 ${info.forks}, updated ${info.updatedAt}`);

    console.log("📂 Crawling repository files...");
    const files = await crawlRepository(source, repository, policy);
    console.log(`   → Found ${files.length} files`);

    const structure = analyzeStructure(files);

    console.log("📌 Fetching activity (commits, contributors, issues)...");
    const activity = await fetchActivity(source, repository, policy, {
        recentSince: recencyThreshold(now(), deps.recentActivityDays ?? 365),
    });
    console.log(`   → ${activity.totalCommits} commits, ${activity.totalContributors} contributors, ${activity.totalIssues} issues`);

    console.log("📌 Sampling code files...");
    const samples = await sampleContents(source, files, policy, { concurrency: deps.concurrency });

    const rawGeneratedText = await generateReport(
        generator,
        { info, structure, activity, files: samples },
        policy,
        { model: deps.model }
    );

    const assessment = extractAssessment(rawGeneratedText);

    if (policy.degradations.length > 0) {
        console.warn(`⚠️ Analysis completed with ${policy.degradations.length} degraded step(s)`);
    } else {
        console.log("🎉 Analysis finished!");
    }

    return {
        report: {
            repository,
            info,
            structure,
            activity,
            rawGeneratedText,
            sampledFileCount: samples.length,
        },
        assessment,
    };
}
