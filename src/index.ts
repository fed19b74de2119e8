#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config();

import { loadConfig, type AppConfig } from "../shared/config/env.js";
import { OctokitGitHubSource } from "./data_sources/github/octokitSource.js";
import { renderDirectoryTree } from "./pipeline/steps/analyzeStructure.js";
import { analyzeForPresentation } from "./pipeline/presentation.js";
import type { AnalysisDependencies } from "./pipeline/runAnalysis.js";
import { createTextGenerator } from "./service/analysis/textGenerator.js";
import { startServer } from "./server/index.js";

const args = process.argv.slice(2);

function printHelp() {
    console.log(`
🔎 repo-larp-check - GitHub Repository Authenticity Analyzer

Usage:
  repo-larp-check <command> [options]

Commands:
  analyze <github-url>   레포지토리를 분석하고 평가 보고서 출력
  serve                  HTTP API 서버 실행 (POST /api/analyze)
  help                   도움말 출력

Options:
  --raw                  analyze: 추출 전 LLM 원문도 함께 출력
  --tree                 analyze: 디렉토리 구조 출력

Examples:
  npm run analyze -- https://github.com/owner/repo
  npm run analyze -- git@github.com:owner/repo.git --raw
  npm run server

📄 Configuration (.env):
  GITHUB_TOKEN, LLM_PROVIDER (openai | anthropic), OPENAI_API_KEY, CLAUDE_API_KEY,
  RECENT_ACTIVITY_DAYS, ANALYSIS_TIMEOUT_MS, DISPLAY_SEGMENT_LIMIT, API_PORT
`);
}

function buildDependencies(config: AppConfig): AnalysisDependencies {
    return {
        source: OctokitGitHubSource.fromToken(config.githubToken),
        generator: createTextGenerator(config),
        recentActivityDays: config.recentActivityDays,
    };
}

async function runAnalyze(config: AppConfig, url: string, flags: string[]): Promise<number> {
    const outcome = await analyzeForPresentation(url, buildDependencies(config), {
        timeoutMs: config.analysisTimeoutMs,
        segmentLimit: config.displaySegmentLimit,
    });

    if (!outcome.ok) {
        console.error(`\n❌ Analysis failed: ${outcome.error}`);
        return 1;
    }

    const { display, result } = outcome;

    console.log("\n--- REPOSITORY ANALYSIS ---\n");
    console.log(`${display.title} (${display.url})`);
    console.log(display.author.name);
    console.log("");
    display.infoLines.forEach((line) => console.log(line));

    if (display.verdictLine) {
        console.log(`\nVerdict: ${display.verdictLine}`);
    }
    if (display.ratingLines.length > 0) {
        console.log("\nRatings:");
        display.ratingLines.forEach((line) => console.log(line));
    }

    display.segments.forEach((segment, index) => {
        console.log(index === 0 ? "\nAnalysis Summary" : `\nAnalysis Summary (continued ${index})`);
        console.log("---------------------------------------------------");
        console.log(segment);
    });

    if (flags.includes("--tree")) {
        console.log("\n📂 Directory structure:");
        renderDirectoryTree(result.report.structure.directoryTree).forEach((line) => console.log(line));
    }
    if (flags.includes("--raw")) {
        console.log("\n🤖 Raw assessment:");
        console.log(result.report.rawGeneratedText);
    }

    console.log(`\n${display.footer}`);
    return 0;
}

async function main(): Promise<number> {
    const flags = args.filter((arg) => arg.startsWith("--"));
    const positional = args.filter((arg) => !arg.startsWith("--"));
    const cmd = positional[0];

    if (!cmd || cmd === "help" || flags.includes("--help")) {
        printHelp();
        return 0;
    }

    const config = loadConfig();

    if (cmd === "analyze") {
        const url = positional[1];
        if (!url) {
            console.error("❌ GitHub 레포지토리 URL을 입력해주세요.");
            console.error("   사용법: repo-larp-check analyze <github-url>");
            return 1;
        }
        return runAnalyze(config, url, flags);
    }

    if (cmd === "serve") {
        startServer(config, buildDependencies(config));
        return 0;
    }

    console.error(`❌ Unknown command: ${cmd}`);
    printHelp();
    return 1;
}

main()
    .then((code) => {
        if (code !== 0) process.exitCode = code;
    })
    .catch((err) => {
        console.error(err);
        process.exit(1);
    });
