import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

// Load environment variables
dotenv.config();

// Default configuration file path
const DEFAULT_CONFIG_PATH = path.join(process.cwd(), 'agent-config.json');

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

// Configuration interface
export interface AgentConfig {
  // API keys
  apiKeys: {
    openai: string;
  };

  // Browser settings
  browser: {
    headless: boolean;
    slowMo: number;
    defaultTimeout: number;
    navigationTimeout: number;
    networkIdleTimeout: number;
    loadFallbackTimeout: number;
    userAgent: string;
  };

  // Text-generation settings
  ai: {
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    maxRetries: number;
    contextChars: number;
  };

  // Work-item completion loop
  completion: {
    maxQuestions: number;
    questionDelayMs: number;
    itemDelayMs: number;
    strictOptionMatching: boolean;
  };

  // Command parsing
  parser: {
    searchFallback: boolean;
  };

  // Logging settings
  logging: {
    logDir: string;
    logLevel: LogLevelName;
    logToFile: boolean;
  };

  paths: {
    screenshotDir: string;
  };
}

export type ConfigOverrides = {
  [Section in keyof AgentConfig]?: Partial<AgentConfig[Section]>;
};

function parseLogLevel(value: string | undefined): LogLevelName {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return 'info';
  }
}

// Default configuration
const defaultConfig: AgentConfig = {
  apiKeys: {
    openai: process.env.OPENAI_API_KEY || '',
  },

  browser: {
    headless: process.env.HEADLESS === 'true',
    slowMo: parseInt(process.env.SLOW_MO || '50'),
    defaultTimeout: parseInt(process.env.DEFAULT_TIMEOUT || '30000'),
    navigationTimeout: parseInt(process.env.NAVIGATION_TIMEOUT || '30000'),
    networkIdleTimeout: parseInt(process.env.NETWORK_IDLE_TIMEOUT || '20000'),
    loadFallbackTimeout: parseInt(process.env.LOAD_FALLBACK_TIMEOUT || '10000'),
    userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
  },

  ai: {
    model: process.env.OPENAI_MODEL_NAME || 'gpt-4o-mini',
    temperature: parseFloat(process.env.OPENAI_TEMPERATURE || '0.1'),
    maxTokens: parseInt(process.env.OPENAI_MAX_TOKENS || '2000'),
    timeoutMs: parseInt(process.env.OPENAI_TIMEOUT_MS || '60000'),
    maxRetries: parseInt(process.env.OPENAI_MAX_RETRIES || '2'),
    contextChars: parseInt(process.env.CONTEXT_CHARS || '1500'),
  },

  completion: {
    maxQuestions: parseInt(process.env.MAX_QUESTIONS || '50'),
    questionDelayMs: parseInt(process.env.QUESTION_DELAY_MS || '1000'),
    itemDelayMs: parseInt(process.env.ITEM_DELAY_MS || '2000'),
    strictOptionMatching: process.env.STRICT_OPTION_MATCHING === 'true',
  },

  parser: {
    searchFallback: process.env.PARSER_SEARCH_FALLBACK === 'true',
  },

  logging: {
    logDir: process.env.LOG_DIR || './logs',
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
    logToFile: process.env.LOG_TO_FILE !== 'false',
  },

  paths: {
    screenshotDir: process.env.SCREENSHOT_DIR || './screenshots',
  },
};

/**
 * Get a fresh copy of the environment-derived defaults
 */
export function getDefaultConfig(): AgentConfig {
  return mergeConfig(defaultConfig, {});
}

/**
 * Load configuration from a JSON file
 * @param configPath Path to the configuration file
 * @returns Loaded configuration merged with defaults
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): AgentConfig {
  try {
    // Check if config file exists
    if (fs.existsSync(configPath)) {
      const fileConfig: ConfigOverrides = JSON.parse(fs.readFileSync(configPath, 'utf8'));

      // Section-wise merge with default config
      return mergeConfig(defaultConfig, fileConfig);
    }
  } catch (error) {
    console.error(`Error loading config from ${configPath}:`, error);
  }

  // Return default config if file doesn't exist or there's an error
  return getDefaultConfig();
}

/**
 * Save configuration to a JSON file
 * @param config Configuration to save
 * @param configPath Path to save the configuration file
 */
export function saveConfig(config: AgentConfig, configPath: string = DEFAULT_CONFIG_PATH): void {
  // Create directory if it doesn't exist
  const dir = path.dirname(configPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  // Write config to file
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2));
}

/**
 * Validate configuration
 * @param config Configuration to validate
 * @returns Validation result with errors if any
 */
export function validateConfig(config: AgentConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.apiKeys.openai) {
    errors.push('Missing OpenAI API key');
  }

  if (!Number.isInteger(config.completion.maxQuestions) || config.completion.maxQuestions < 1) {
    errors.push('completion.maxQuestions must be a positive integer');
  }

  if (config.browser.navigationTimeout <= 0 || config.browser.defaultTimeout <= 0) {
    errors.push('Browser timeouts must be positive');
  }

  if (config.ai.temperature < 0 || config.ai.temperature > 2) {
    errors.push('ai.temperature must be between 0 and 2');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Merge overrides over a base configuration, one section at a time
 * @param base Base configuration
 * @param overrides Partial sections to apply
 * @returns Merged configuration
 */
export function mergeConfig(base: AgentConfig, overrides: ConfigOverrides): AgentConfig {
  return {
    apiKeys: { ...base.apiKeys, ...overrides.apiKeys },
    browser: { ...base.browser, ...overrides.browser },
    ai: { ...base.ai, ...overrides.ai },
    completion: { ...base.completion, ...overrides.completion },
    parser: { ...base.parser, ...overrides.parser },
    logging: { ...base.logging, ...overrides.logging },
    paths: { ...base.paths, ...overrides.paths },
  };
}

// Export default config
export default loadConfig();
