/**
 * Monitor Configuration
 *
 * Resolves the immutable configuration snapshot consumed by the tracker and
 * the timeout monitor. Sources, later wins: defaults, an optional JSON file,
 * then environment variables. Invalid thresholds are rejected here, so the
 * monitor never sees warning >= timeout.
 */

import * as fs from 'fs';
import { ConfigurationError, describeError } from './structured_error';
import { SchemaValidator, JsonSchema, isRecord } from './schema_validator';

// Defaults: warn after 4 minutes, consider the execution stuck after 5
export const DEFAULT_WARNING_THRESHOLD_S = 240;
export const DEFAULT_TIMEOUT_THRESHOLD_S = 300;

export const ENV_KEYS = {
    CONFIG_FILE: 'CELLWATCH_CONFIG',
    ENABLED: 'CELLWATCH_TIMEOUT_MONITORING',
    WARNING_THRESHOLD: 'CELLWATCH_WARNING_THRESHOLD',
    TIMEOUT_THRESHOLD: 'CELLWATCH_TIMEOUT_THRESHOLD',
    AUTO_INTERRUPT: 'CELLWATCH_AUTO_INTERRUPT',
    DEBUG_EVENTS: 'CELLWATCH_DEBUG_EVENTS',
    DEBUG_DISPLAY: 'CELLWATCH_DEBUG_DISPLAY',
} as const;

export interface TransportDebugFlags {
    /** Log every lifecycle event the host emits. */
    events: boolean;
    /** Log every display bundle carried by the host's presentation channel. */
    display: boolean;
}

export interface MonitorConfig {
    enabled: boolean;
    warningThresholdSeconds: number;
    timeoutThresholdSeconds: number;
    autoInterruptEnabled: boolean;
    debug: TransportDebugFlags;
}

export const DEFAULT_CONFIG: Readonly<MonitorConfig> = Object.freeze({
    enabled: false,
    warningThresholdSeconds: DEFAULT_WARNING_THRESHOLD_S,
    timeoutThresholdSeconds: DEFAULT_TIMEOUT_THRESHOLD_S,
    autoInterruptEnabled: false,
    debug: Object.freeze({ events: false, display: false }),
});

/* -------------------------------------------------------------------------- */
/* File schema                                                                */
/* -------------------------------------------------------------------------- */

const CONFIG_FILE_SCHEMA_ID = 'cellwatch-config';

const CONFIG_FILE_SCHEMA: JsonSchema = {
    type: 'object',
    additionalProperties: false,
    properties: {
        enable_timeout_monitoring: { type: 'boolean' },
        warning_threshold: { type: 'number' },
        timeout_threshold: { type: 'number' },
        auto_interrupt: { type: 'boolean' },
        debug_events: { type: 'boolean' },
        debug_display: { type: 'boolean' },
    },
};

const validator = new SchemaValidator();
validator.registerSchema(CONFIG_FILE_SCHEMA_ID, CONFIG_FILE_SCHEMA);

type Overrides = Partial<Omit<MonitorConfig, 'debug'>> & { debug?: Partial<TransportDebugFlags> };

function readConfigFile(filePath: string): Overrides {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (err) {
        throw new ConfigurationError(`Cannot read config file ${filePath}: ${describeError(err)}`);
    }

    const result = validator.validate(raw, CONFIG_FILE_SCHEMA_ID);
    if (!result.valid || !isRecord(raw)) {
        const details = result.errors.map(e => `${e.path || '<root>'}: ${e.message}`).join('; ');
        throw new ConfigurationError(`Invalid config file ${filePath}: ${details}`);
    }

    const overrides: Overrides = {};
    const debug: Partial<TransportDebugFlags> = {};
    if (typeof raw.enable_timeout_monitoring === 'boolean') overrides.enabled = raw.enable_timeout_monitoring;
    if (typeof raw.warning_threshold === 'number') overrides.warningThresholdSeconds = raw.warning_threshold;
    if (typeof raw.timeout_threshold === 'number') overrides.timeoutThresholdSeconds = raw.timeout_threshold;
    if (typeof raw.auto_interrupt === 'boolean') overrides.autoInterruptEnabled = raw.auto_interrupt;
    if (typeof raw.debug_events === 'boolean') debug.events = raw.debug_events;
    if (typeof raw.debug_display === 'boolean') debug.display = raw.debug_display;
    overrides.debug = debug;
    return overrides;
}

/* -------------------------------------------------------------------------- */
/* Environment                                                                */
/* -------------------------------------------------------------------------- */

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

export function parseBooleanFlag(name: string, value: string): boolean {
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.includes(normalized)) return true;
    if (FALSE_VALUES.includes(normalized)) return false;
    throw new ConfigurationError(`${name} must be a boolean flag, got '${value}'`, name);
}

export function parseSeconds(name: string, value: string): number {
    const parsed = Number(value.trim());
    if (value.trim() === '' || !Number.isFinite(parsed)) {
        throw new ConfigurationError(`${name} must be a finite number of seconds, got '${value}'`, name);
    }
    return parsed;
}

function readEnvironment(env: NodeJS.ProcessEnv): Overrides {
    const overrides: Overrides = {};
    const debug: Partial<TransportDebugFlags> = {};

    const enabled = env[ENV_KEYS.ENABLED];
    if (enabled !== undefined) overrides.enabled = parseBooleanFlag(ENV_KEYS.ENABLED, enabled);

    const warning = env[ENV_KEYS.WARNING_THRESHOLD];
    if (warning !== undefined) overrides.warningThresholdSeconds = parseSeconds(ENV_KEYS.WARNING_THRESHOLD, warning);

    const timeout = env[ENV_KEYS.TIMEOUT_THRESHOLD];
    if (timeout !== undefined) overrides.timeoutThresholdSeconds = parseSeconds(ENV_KEYS.TIMEOUT_THRESHOLD, timeout);

    const autoInterrupt = env[ENV_KEYS.AUTO_INTERRUPT];
    if (autoInterrupt !== undefined) overrides.autoInterruptEnabled = parseBooleanFlag(ENV_KEYS.AUTO_INTERRUPT, autoInterrupt);

    const debugEvents = env[ENV_KEYS.DEBUG_EVENTS];
    if (debugEvents !== undefined) debug.events = parseBooleanFlag(ENV_KEYS.DEBUG_EVENTS, debugEvents);

    const debugDisplay = env[ENV_KEYS.DEBUG_DISPLAY];
    if (debugDisplay !== undefined) debug.display = parseBooleanFlag(ENV_KEYS.DEBUG_DISPLAY, debugDisplay);

    overrides.debug = debug;
    return overrides;
}

/* -------------------------------------------------------------------------- */
/* Resolution                                                                 */
/* -------------------------------------------------------------------------- */

function merge(base: MonitorConfig, overrides: Overrides): MonitorConfig {
    return {
        enabled: overrides.enabled ?? base.enabled,
        warningThresholdSeconds: overrides.warningThresholdSeconds ?? base.warningThresholdSeconds,
        timeoutThresholdSeconds: overrides.timeoutThresholdSeconds ?? base.timeoutThresholdSeconds,
        autoInterruptEnabled: overrides.autoInterruptEnabled ?? base.autoInterruptEnabled,
        debug: {
            events: overrides.debug?.events ?? base.debug.events,
            display: overrides.debug?.display ?? base.debug.display,
        },
    };
}

/**
 * Rejects snapshots the monitor must never see. A warning threshold <= 0 is
 * allowed and means the warning phase is skipped.
 */
export function validateConfig(config: MonitorConfig): void {
    if (!Number.isFinite(config.warningThresholdSeconds)) {
        throw new ConfigurationError('warning threshold must be finite', 'warningThresholdSeconds');
    }
    if (!Number.isFinite(config.timeoutThresholdSeconds) || config.timeoutThresholdSeconds <= 0) {
        throw new ConfigurationError('timeout threshold must be a positive number of seconds', 'timeoutThresholdSeconds');
    }
    if (config.warningThresholdSeconds > 0 && config.warningThresholdSeconds >= config.timeoutThresholdSeconds) {
        throw new ConfigurationError(
            `warning threshold (${config.warningThresholdSeconds}s) must be lower than timeout threshold (${config.timeoutThresholdSeconds}s)`,
            'warningThresholdSeconds'
        );
    }
}

export function freezeConfig(config: MonitorConfig): Readonly<MonitorConfig> {
    validateConfig(config);
    return Object.freeze({ ...config, debug: Object.freeze({ ...config.debug }) });
}

export interface LoadConfigOptions {
    env?: NodeJS.ProcessEnv;
    /** Explicit config file; falls back to CELLWATCH_CONFIG. */
    filePath?: string;
    /** Values applied after file and environment (e.g. CLI flags). */
    overrides?: Overrides;
}

/**
 * Build the configuration snapshot.
 *
 * @throws ConfigurationError on malformed input or inconsistent thresholds
 */
export function loadMonitorConfig(options: LoadConfigOptions = {}): Readonly<MonitorConfig> {
    const env = options.env ?? process.env;
    const filePath = options.filePath ?? env[ENV_KEYS.CONFIG_FILE];

    let config: MonitorConfig = merge(DEFAULT_CONFIG, {});
    if (filePath) config = merge(config, readConfigFile(filePath));
    config = merge(config, readEnvironment(env));
    if (options.overrides) config = merge(config, options.overrides);

    return freezeConfig(config);
}

/**
 * Get configuration summary for logging.
 */
export function getConfigSummary(config: MonitorConfig): Record<string, unknown> {
    return {
        enabled: config.enabled,
        warning_threshold_s: config.warningThresholdSeconds,
        timeout_threshold_s: config.timeoutThresholdSeconds,
        auto_interrupt: config.autoInterruptEnabled,
        debug_events: config.debug.events,
        debug_display: config.debug.display,
    };
}
