import type { ActivityMetrics } from "../../models/Activity.js";
import type { SampledFile } from "../../models/File.js";
import type { RepositoryInfo } from "../../models/Repository.js";
import type { RepoStructure } from "../../models/Structure.js";

export const EXCERPT_LENGTH = 1000;
export const TRUNCATION_MARKER = "...[truncated]";

export const SYSTEM_PROMPT =
    "You are a senior blockchain security expert conducting due diligence on cryptocurrency projects. " +
    "Your task is to analyze GitHub repositories to determine if they contain legitimate code or are 'larping' " +
    "(pretending to be more substantial than they are). Be brutally honest and concise in your assessment.";

const ANALYSIS_INSTRUCTIONS = `ANALYSIS INSTRUCTIONS:
1. Provide a concise assessment (max 500 words total) focused on these key questions:
   a) Is this a real, functional project or just empty promises?
   b) Does the code actually implement what the project claims?
   c) Are there specific red flags indicating a scam or incompetence?
   d) Is this a copy/paste of another project with minimal modifications?

2. Rate each of the following on a scale of 1-5 (1=Very Poor, 5=Excellent):
   - CODE QUALITY: Is the code well-written or amateurish?
   - COMPLETENESS: Is it a complete implementation or just a skeleton?
   - SECURITY: Are there obvious security flaws?
   - ORIGINALITY: Is this unique code or copied/forked?
   - ACTIVITY: Is this an actively maintained project?

3. VERDICT: Explicitly state whether this project is LEGITIMATE or LARPING (use BORDERLINE only when the evidence is genuinely mixed), with a 1-2 sentence explanation.`;

/**
 * 파일 내용을 앞 1000자로 자르고, 잘린 경우 표시를 붙입니다.
 */
export function excerpt(content: string, length: number = EXCERPT_LENGTH): string {
    return content.length > length ? content.slice(0, length) + TRUNCATION_MARKER : content;
}

export interface PromptInput {
    info: RepositoryInfo;
    structure: RepoStructure;
    activity: ActivityMetrics;
    files: SampledFile[];
}

/**
 * 레포지토리 개요, 분석 지시문, 파일 발췌를 하나의 프롬프트로 합칩니다.
 */
export function buildAnalysisPrompt({ info, structure, activity, files }: PromptInput): string {
    const overview = [
        "REPOSITORY OVERVIEW:",
        `- Name: ${info.name}`,
        `- Description: ${info.description || "No description"}`,
        `- Stars: ${info.stars}`,
        `- Forks: ${info.forks}`,
        `- Total files: ${structure.totalFiles}`,
        `- File types: ${JSON.stringify(structure.fileTypeCounts)}`,
        `- Total commits: ${activity.totalCommits}`,
        `- Total contributors: ${activity.totalContributors}`,
        `- Recent activity: ${activity.recentActivity ? "Yes" : "No"}`,
    ].join("\n");

    const excerpts = files
        .map((file) => `--- ${file.path} ---\n${excerpt(file.content)}\n`)
        .join("\n");

    return [
        `Analyze this cryptocurrency/blockchain GitHub repository to determine if the project is "larping" (pretending to be more substantial than it actually is).`,
        overview,
        ANALYSIS_INSTRUCTIONS,
        "Here are excerpts from key files:",
        excerpts,
    ].join("\n\n");
}
