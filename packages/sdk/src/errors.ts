/**
 * Error taxonomy.
 *
 * Configuration and format errors are fatal and reach the caller of
 * configure()/loadConfig(). Delivery errors never leave a sink: they are
 * handed to the pipeline's sink_error listeners instead.
 */

export class LogRelayError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'LogRelayError';
	}
}

function describeValue(value: unknown): string {
	try {
		return JSON.stringify(value) ?? String(value);
	} catch {
		return String(value);
	}
}

// ─── Configuration ────────────────────────────────────────────────────────────

export class ConfigurationError extends LogRelayError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'ConfigurationError';
	}
}

/** A required setting was not provided by any source */
export class MissingSettingError extends ConfigurationError {
	readonly setting: string;

	constructor(setting: string, options?: ErrorOptions) {
		super(`Missing required setting: ${setting}`, options);
		this.name = 'MissingSettingError';
		this.setting = setting;
	}
}

/** A setting was provided but failed coercion or validation */
export class InvalidSettingError extends ConfigurationError {
	readonly setting: string;
	readonly value: unknown;
	readonly reason: string;

	constructor(setting: string, value: unknown, reason: string, options?: ErrorOptions) {
		super(`Invalid setting ${setting}=${describeValue(value)}: ${reason}`, options);
		this.name = 'InvalidSettingError';
		this.setting = setting;
		this.value = value;
		this.reason = reason;
	}
}

export class ConfigFileNotFoundError extends ConfigurationError {
	readonly path: string;

	constructor(path: string, options?: ErrorOptions) {
		super(`Config file not found: ${path}`, options);
		this.name = 'ConfigFileNotFoundError';
		this.path = path;
	}
}

// ─── Format ───────────────────────────────────────────────────────────────────

export class UnsupportedFormatError extends LogRelayError {
	readonly path: string;

	constructor(path: string) {
		super(`Unsupported config file format: ${path}`);
		this.name = 'UnsupportedFormatError';
		this.path = path;
	}
}

// ─── Delivery ─────────────────────────────────────────────────────────────────

export class DeliveryError extends LogRelayError {
	readonly sink: string;
	readonly attempts: number;
	readonly status?: number;

	constructor(
		sink: string,
		message: string,
		details: { attempts: number; status?: number },
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = 'DeliveryError';
		this.sink = sink;
		this.attempts = details.attempts;
		this.status = details.status;
	}
}

/** Normalize a thrown value to an Error */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
