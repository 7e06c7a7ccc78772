import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

export type RunnerType = "local" | "docker" | "ci";

/**
 * Detect where the tester is running. File and env checks only.
 */
export function detectRunnerType(env: NodeJS.ProcessEnv = process.env): RunnerType {
	if (env.CI || env.GITHUB_ACTIONS) {
		return "ci";
	}

	try {
		if (fs.existsSync("/.dockerenv")) {
			return "docker";
		}
	} catch {
		// Unreadable root: treat as local
	}

	return "local";
}

/**
 * Find the .git directory by walking up from `startDir`.
 */
function findGitDir(startDir: string): string | undefined {
	let current = path.resolve(startDir);
	const root = path.parse(current).root;

	while (current !== root) {
		const gitDir = path.join(current, ".git");
		if (fs.existsSync(gitDir)) {
			return gitDir;
		}
		current = path.dirname(current);
	}

	return undefined;
}

/**
 * Commit SHA of the working copy, read straight from .git.
 */
export function getGitSha(cwd: string = process.cwd()): string | undefined {
	try {
		const gitDir = findGitDir(cwd);
		if (!gitDir) {
			return undefined;
		}

		const head = fs.readFileSync(path.join(gitDir, "HEAD"), "utf-8").trim();
		if (!head.startsWith("ref: ")) {
			return head;
		}

		const refPath = path.join(gitDir, head.substring(5));
		return fs.existsSync(refPath) ? fs.readFileSync(refPath, "utf-8").trim() : undefined;
	} catch {
		return undefined;
	}
}

export interface NetworkInterfaceInfo {
	name: string;
	address: string;
	netmask: string;
}

/**
 * Host context printed before a run, useful when comparing results across machines.
 */
export interface SystemInfo {
	os: string;
	hostname: string;
	cpuCount: number;
	/** 1-minute load average (0 on Windows) */
	loadAverage: number;
	/** Percentage of memory in use */
	memoryUsage: number;
	networkInterfaces: NetworkInterfaceInfo[];
}

export function getSystemInfo(): SystemInfo {
	const totalMem = os.totalmem();
	const networkInterfaces: NetworkInterfaceInfo[] = [];

	for (const [name, addresses] of Object.entries(os.networkInterfaces())) {
		for (const address of addresses ?? []) {
			if (address.family === "IPv4") {
				networkInterfaces.push({ name, address: address.address, netmask: address.netmask });
			}
		}
	}

	return {
		os: `${os.type()} ${os.release()}`,
		hostname: os.hostname(),
		cpuCount: os.cpus().length,
		loadAverage: os.loadavg()[0],
		memoryUsage: totalMem > 0 ? ((totalMem - os.freemem()) / totalMem) * 100 : 0,
		networkInterfaces,
	};
}

export interface RunMetadata {
	gitSha?: string;
	runnerType: RunnerType;
	nodeVersion: string;
	system: SystemInfo;
}

/**
 * Collect metadata for run results. Never throws.
 */
export function collectMetadata(): RunMetadata {
	return {
		gitSha: getGitSha(),
		runnerType: detectRunnerType(),
		nodeVersion: process.version,
		system: getSystemInfo(),
	};
}
