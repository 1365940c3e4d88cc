/**
 * Configuration Management
 *
 * Builds a DetectorConfig from defaults, environment variables (optionally
 * loaded from a .env file) and explicit overrides, in that order.
 */

import { existsSync } from 'fs';
import { resolve } from 'path';
import { config as loadEnv } from 'dotenv';
import { Result, ok, err, errorMessage } from './result-types.js';
import { ConfigurationError } from './errors/DetectorErrors.js';
import { isLogLevel } from './logger.js';
import { createDefaultConfig, type DetectorConfig } from '../models/DetectorConfig.js';

const ENV_PREFIX = 'BREAKING_CHANGES_';

const TRUTHY = ['true', '1', 'yes', 'on'];

/**
 * Configuration Manager
 *
 * Environment variables use the BREAKING_CHANGES_ prefix; pattern lists are
 * comma separated.
 */
export class ConfigurationManager {
	constructor(
		private readonly env: NodeJS.ProcessEnv = process.env,
		private readonly envPath?: string
	) {}

	/**
	 * Load variables from a .env file into process.env
	 *
	 * A missing file is not an error. Variables already set are kept.
	 */
	loadEnvFile(): Result<void, ConfigurationError> {
		try {
			loadEnv({ path: this.envPath });
			return ok(undefined);
		} catch (error) {
			return err(new ConfigurationError('envPath', `Failed to load .env file: ${errorMessage(error)}`));
		}
	}

	/**
	 * Resolve the final configuration
	 *
	 * @param overrides - Values that win over both defaults and environment; unset keys must be left out
	 */
	load(overrides: Partial<DetectorConfig> = {}): Result<DetectorConfig, ConfigurationError> {
		const fromEnv = this.readEnvironment();
		if (fromEnv.isErr()) {
			return err(fromEnv.error);
		}

		const config: DetectorConfig = {
			...createDefaultConfig(),
			...fromEnv.value,
			...overrides,
		};

		return this.validate(config);
	}

	private readEnvironment(): Result<Partial<DetectorConfig>, ConfigurationError> {
		const out: Partial<DetectorConfig> = {};

		const baseRef = this.getEnvVar('BASE_REF');
		if (baseRef) out.baseRef = baseRef;
		const headRef = this.getEnvVar('HEAD_REF');
		if (headRef) out.headRef = headRef;
		const repoPath = this.getEnvVar('REPO_PATH');
		if (repoPath) out.repositoryPath = repoPath;

		const ignoreUnused = this.getEnvBoolean('IGNORE_UNUSED');
		if (ignoreUnused !== undefined) out.ignoreUnused = ignoreUnused;

		const include = this.getEnvList('INCLUDE_PATTERNS');
		if (include) out.includePatterns = include;
		const exclude = this.getEnvList('EXCLUDE_PATTERNS');
		if (exclude) out.excludePatterns = exclude;
		const roots = this.getEnvList('MODULE_ROOTS');
		if (roots) out.moduleRootPrefixes = roots;

		const jsonOutput = this.getEnvVar('JSON_OUTPUT');
		if (jsonOutput) out.jsonOutput = jsonOutput;
		const markdownOutput = this.getEnvVar('MARKDOWN_OUTPUT');
		if (markdownOutput) out.markdownOutput = markdownOutput;
		const logFile = this.getEnvVar('LOG_FILE');
		if (logFile) out.logFile = logFile;

		const logLevel = this.getEnvVar('LOG_LEVEL');
		if (logLevel) {
			const normalized = normalizeLogLevel(logLevel);
			if (!normalized) {
				return err(new ConfigurationError('logLevel', `Unknown log level: ${logLevel}`));
			}
			out.logLevel = normalized;
		}

		const failOnBreaking = this.getEnvBoolean('FAIL_ON_BREAKING');
		if (failOnBreaking !== undefined) out.failOnBreaking = failOnBreaking;

		const maxFiles = this.getEnvNumber('MAX_SEARCH_FILES');
		if (maxFiles !== undefined) out.maxUsageSearchFiles = maxFiles;
		const concurrency = this.getEnvNumber('CONCURRENCY');
		if (concurrency !== undefined) out.concurrency = concurrency;

		const enableAst = this.getEnvBoolean('ENABLE_AST');
		if (enableAst !== undefined) out.enableAstAnalysis = enableAst;
		const enableRegex = this.getEnvBoolean('ENABLE_REGEX');
		if (enableRegex !== undefined) out.enableRegexAnalysis = enableRegex;

		return ok(out);
	}

	private validate(config: DetectorConfig): Result<DetectorConfig, ConfigurationError> {
		if (!existsSync(resolve(config.repositoryPath))) {
			return err(new ConfigurationError('repositoryPath', `Repository path does not exist: ${resolve(config.repositoryPath)}`));
		}
		if (!Number.isInteger(config.maxUsageSearchFiles) || config.maxUsageSearchFiles <= 0) {
			return err(new ConfigurationError('maxUsageSearchFiles', 'must be a positive integer'));
		}
		if (!Number.isInteger(config.concurrency) || config.concurrency <= 0) {
			return err(new ConfigurationError('concurrency', 'must be a positive integer'));
		}
		if (config.includePatterns.length === 0) {
			return err(new ConfigurationError('includePatterns', 'at least one include pattern is required'));
		}
		if (!config.baseRef.trim() || !config.headRef.trim()) {
			return err(new ConfigurationError('baseRef', 'git references cannot be empty'));
		}
		return ok(config);
	}

	private getEnvVar(key: string): string | undefined {
		const value = this.env[ENV_PREFIX + key];
		return value && value.trim() ? value.trim() : undefined;
	}

	private getEnvNumber(key: string): number | undefined {
		const value = this.getEnvVar(key);
		if (!value || !/^\d+$/.test(value)) return undefined;
		return parseInt(value, 10);
	}

	private getEnvBoolean(key: string): boolean | undefined {
		const value = this.getEnvVar(key);
		if (value === undefined) return undefined;
		return TRUTHY.includes(value.toLowerCase());
	}

	private getEnvList(key: string): string[] | undefined {
		const value = this.getEnvVar(key);
		if (!value) return undefined;
		const items = value.split(',').map(p => p.trim()).filter(p => p.length > 0);
		return items.length > 0 ? items : undefined;
	}
}

/**
 * Accepts the usual level spellings (DEBUG, warning, ...)
 */
export function normalizeLogLevel(raw: string): DetectorConfig['logLevel'] | undefined {
	const value = raw.trim().toLowerCase();
	if (value === 'warning') return 'warn';
	if (value === 'critical') return 'error';
	return isLogLevel(value) ? value : undefined;
}
