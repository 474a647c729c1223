import { readFile, access } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError, errorMessage } from '../core/errors.js';
import type { MergedConfig, SimulationConfigFile, LLMProviderName } from './config-schema.js';
import {
  DEFAULT_CONFIG,
  CONFIG_FILE_VERSION,
  LLM_PROVIDERS,
  configFileSchema,
} from './config-schema.js';
import { CARE_ROLES } from '../types/index.js';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

const SCHEDULE_KEYS: readonly (keyof MergedConfig['schedule'])[] = [
  'diagnosticIntervalDays',
  'exerciseRefreshDays',
  'travelHomeDays',
  'travelAwayDays',
  'wearableRefreshDays',
  'healthCheckStartDelayDays',
  'wellnessCheckDays',
  'nutritionReviewDays',
  'strategicReviewDays',
];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isProviderName(value: string): value is LLMProviderName {
  return LLM_PROVIDERS.some((provider) => provider === value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Builds the run configuration in three layers, later ones winning:
 * built-in defaults, then `<configPath>/simulation.json`, then the environment.
 * The API key only ever comes from the environment.
 *
 * Without an explicit `configPath` the file is looked up under
 * `$DATA_PATH/config`, or `data/config` when DATA_PATH is unset.
 */
export class ConfigLoader {
  private readonly configPath: string | undefined;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: SimulationConfigFile | null = null;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  get configDir(): string {
    if (this.configPath) return this.configPath;
    const dataPath = this.env['DATA_PATH'];
    return dataPath ? join(dataPath, 'config') : DEFAULT_CONFIG.paths.config;
  }

  async load(): Promise<MergedConfig> {
    const configDir = this.configDir;
    this.loadedConfig = await this.loadConfigFile(configDir);

    const config = structuredClone(DEFAULT_CONFIG);

    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);
    config.paths.config = configDir;

    return config;
  }

  /** The validated file as read by the last load(), or null when there was none */
  getLoadedConfigFile(): SimulationConfigFile | null {
    return this.loadedConfig;
  }

  private async loadConfigFile(configDir: string): Promise<SimulationConfigFile | null> {
    const filePath = join(configDir, 'simulation.json');

    let content: string;
    try {
      await access(filePath);
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new ConfigurationError(`Failed to load config file: ${errorMessage(error)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Config file ${filePath} is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Config file ${filePath} is invalid: ${issues}`);
    }

    const config = parsed.data;
    if (config.version && config.version > CONFIG_FILE_VERSION) {
      throw new ConfigurationError(
        `Config file version (${String(config.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return config;
  }

  private mergeConfigFile(config: MergedConfig, file: SimulationConfigFile): void {
    if (file.simulation) {
      const { horizonDays, startDate, seed, onboardingDays } = file.simulation;
      if (horizonDays !== undefined) config.simulation.horizonDays = horizonDays;
      if (startDate) config.simulation.startDate = startDate;
      if (seed !== undefined) config.simulation.seed = seed;
      if (onboardingDays !== undefined) config.simulation.onboardingDays = onboardingDays;
    }

    if (file.schedule) {
      for (const key of SCHEDULE_KEYS) {
        const value = file.schedule[key];
        if (value !== undefined) config.schedule[key] = value;
      }
    }

    if (file.member) {
      const { profile, persona, meanDaysBetweenActions, adherenceProbability } = file.member;
      if (profile) config.member.profile = profile;
      if (persona) config.member.persona = persona;
      if (meanDaysBetweenActions !== undefined) {
        config.member.meanDaysBetweenActions = meanDaysBetweenActions;
      }
      if (adherenceProbability !== undefined) {
        config.member.adherenceProbability = adherenceProbability;
      }
    }

    if (file.careTeam) {
      for (const role of CARE_ROLES) {
        const override = file.careTeam[role];
        if (!override) continue;
        if (override.name) config.careTeam[role].name = override.name;
        if (override.persona) config.careTeam[role].persona = override.persona;
      }
    }

    if (file.travel) {
      if (file.travel.locations) config.travel.locations = file.travel.locations;
      if (file.travel.homeLocation) config.travel.homeLocation = file.travel.homeLocation;
    }

    if (file.llm) {
      const { enabled, provider, model, local, timeoutMs, maxRetries } = file.llm;
      if (enabled !== undefined) config.llm.enabled = enabled;
      if (provider) config.llm.provider = provider;
      if (model) config.llm.model = model;
      if (local?.baseUrl) config.llm.local.baseUrl = local.baseUrl;
      if (local?.model) config.llm.local.model = local.model;
      if (timeoutMs !== undefined) config.llm.timeoutMs = timeoutMs;
      if (maxRetries !== undefined) config.llm.maxRetries = maxRetries;
    }

    if (file.logging) {
      if (file.logging.level) config.logging.level = file.logging.level;
      if (file.logging.pretty !== undefined) config.logging.pretty = file.logging.pretty;
    }
  }

  private mergeEnvironment(config: MergedConfig): void {
    const env = this.env;

    const enabled = env['LLM_ENABLED'];
    if (enabled !== undefined && enabled !== '') {
      config.llm.enabled = ['1', 'true', 'yes', 'on'].includes(enabled.trim().toLowerCase());
    }

    const provider = env['LLM_PROVIDER'];
    if (provider) {
      const normalized = provider.trim().toLowerCase();
      if (!isProviderName(normalized)) {
        throw new ConfigurationError(
          `Unknown LLM_PROVIDER "${provider}" (expected one of: ${LLM_PROVIDERS.join(', ')})`
        );
      }
      config.llm.provider = normalized;
    }

    const openRouterKey = env['OPENROUTER_API_KEY'];
    if (openRouterKey) {
      config.llm.openRouterApiKey = openRouterKey;
    }

    const model = env['LLM_MODEL'];
    if (model) config.llm.model = model;

    const localBaseUrl = env['LOCAL_LLM_BASE_URL'];
    if (localBaseUrl) config.llm.local.baseUrl = localBaseUrl;

    const localModel = env['LOCAL_LLM_MODEL'];
    if (localModel) config.llm.local.model = localModel;

    const seed = env['SIM_SEED'];
    if (seed) {
      const parsed = Number(seed);
      if (!Number.isInteger(parsed) || parsed < 0) {
        throw new ConfigurationError(`SIM_SEED must be a non-negative integer, got "${seed}"`);
      }
      config.simulation.seed = parsed;
    }

    const horizon = env['SIM_HORIZON_DAYS'];
    if (horizon) {
      const parsed = Number(horizon);
      if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new ConfigurationError(`SIM_HORIZON_DAYS must be a positive number, got "${horizon}"`);
      }
      config.simulation.horizonDays = parsed;
    }

    const logLevel = env['LOG_LEVEL'];
    if (logLevel && isLogLevel(logLevel)) {
      config.logging.level = logLevel;
    }

    const dataPath = env['DATA_PATH'];
    if (dataPath) {
      config.paths.output = join(dataPath, 'output');
      config.paths.logs = join(dataPath, 'logs');
      config.logging.logDir = config.paths.logs;
    }

    const outputDir = env['OUTPUT_DIR'];
    if (outputDir) config.paths.output = outputDir;
  }
}

export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

export async function loadConfig(configPath?: string): Promise<MergedConfig> {
  return createConfigLoader(configPath).load();
}
