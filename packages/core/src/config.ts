import fs from "node:fs";
import path from "node:path";

import { engineConfigSchema, type EngineConfig } from "./configSchema";
import { ConfigurationError } from "./errors";
import { isStrategyId } from "./strategies/ids";

export * from "./configSchema";

let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = [".git", "configs"];

const DEFAULT_BROKER_API_URL = "http://localhost:8000";

export interface EnvConfig {
	brokerApiUrl: string;
	brokerUsername?: string;
	brokerPassword?: string;
	brokerAccount?: string;
	marketDataDir: string;
	outputDir: string;
	configPath: string;
}

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

export const getDefaultConfigPath = (): string =>
	path.join(findWorkspaceRoot(), "configs", "engine.json");

const readOptionalEnvVar = (
	env: NodeJS.ProcessEnv,
	key: string
): string | undefined => {
	const value = env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const resolveFromRoot = (root: string, value: string): string =>
	path.isAbsolute(value) ? value : path.join(root, value);

/**
 * Reads broker credentials and filesystem locations from the environment.
 * Relative paths resolve against the workspace root.
 */
export const loadEnvConfig = (
	env: NodeJS.ProcessEnv = process.env,
	root = findWorkspaceRoot()
): EnvConfig => ({
	brokerApiUrl:
		readOptionalEnvVar(env, "BROKER_API_URL") ?? DEFAULT_BROKER_API_URL,
	brokerUsername: readOptionalEnvVar(env, "BROKER_USERNAME"),
	brokerPassword: readOptionalEnvVar(env, "BROKER_PASSWORD"),
	brokerAccount: readOptionalEnvVar(env, "BROKER_ACCOUNT"),
	marketDataDir: resolveFromRoot(
		root,
		readOptionalEnvVar(env, "MARKET_DATA_DIR") ?? "data"
	),
	outputDir: resolveFromRoot(
		root,
		readOptionalEnvVar(env, "SIGNALS_OUTPUT_DIR") ?? "output"
	),
	configPath: resolveFromRoot(
		root,
		readOptionalEnvVar(env, "SIGNALS_CONFIG") ?? path.join("configs", "engine.json")
	),
});

const deepFreeze = <T>(value: T): T => {
	if (value && typeof value === "object" && !Object.isFrozen(value)) {
		const nested: unknown[] = Object.values(value);
		nested.forEach(deepFreeze);
		Object.freeze(value);
	}
	return value;
};

/**
 * Validates a raw engine configuration once and freezes the result.
 * @throws ConfigurationError listing every failing path
 */
export const parseEngineConfig = (
	raw: unknown,
	source = "<inline>"
): EngineConfig => {
	const parsed = engineConfigSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues.map(
			(issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`
		);
		throw new ConfigurationError(
			`Invalid engine config ${source}: ${issues.join("; ")}`,
			{ source, issues }
		);
	}
	return deepFreeze(parsed.data);
};

export const loadEngineConfig = (
	configPath = getDefaultConfigPath()
): EngineConfig => {
	let contents: string;
	try {
		contents = fs.readFileSync(configPath, "utf-8");
	} catch (error) {
		throw new ConfigurationError(`Engine config not found at ${configPath}`, {
			source: configPath,
			cause: error,
		});
	}
	let raw: unknown;
	try {
		raw = JSON.parse(contents);
	} catch (error) {
		throw new ConfigurationError(`Engine config ${configPath} is not JSON`, {
			source: configPath,
			cause: error,
		});
	}
	return parseEngineConfig(raw, configPath);
};

/**
 * Narrows the configured strategies to `ids`, keeping configuration order.
 * @throws ConfigurationError for ids that are unknown or not configured
 */
export const selectStrategies = (
	config: EngineConfig,
	ids: readonly string[]
): EngineConfig => {
	if (!ids.length) {
		return config;
	}
	const configured = new Set<string>(config.strategies.map((s) => s.id));
	const unknown = ids.filter((id) => !isStrategyId(id) || !configured.has(id));
	if (unknown.length) {
		throw new ConfigurationError(
			`Unknown or unconfigured strategies: ${unknown.join(", ")}`,
			{ requested: ids, configured: [...configured] }
		);
	}
	const wanted = new Set(ids);
	return deepFreeze({
		...config,
		strategies: config.strategies.filter((strategy) => wanted.has(strategy.id)),
	});
};
