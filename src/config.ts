import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import "dotenv/config";
import { z } from "zod";
import type { Credentials } from "./core/types.js";
import { ConfigError } from "./utils/errors.js";

export interface BridgeConfig {
	/** REST base, e.g. https://chat.example.org */
	serverUri: string;
	/** DDP endpoint derived from serverUri */
	streamUrl: string;
	credentials: Credentials;
	/** Usernames allowed to run administrative bot commands */
	admins: string[];

	reconnect: {
		enabled: boolean;
		initialDelayMs: number;
		maxDelayMs: number;
	};

	stream: {
		/** Replay missed room history after a reconnect instead of starting from now */
		resumable: boolean;
		pingIntervalMs: number;
	};

	outbound: {
		maxAttempts: number;
		retryDelayMs: number;
		minIntervalMs: number;
		maxQueueSize: number;
		maxMessageLength: number;
		requestTimeoutMs: number;
	};

	heartbeat: {
		enabled: boolean;
		intervalSec: number;
	};

	logLevel: LogLevel;
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULTS = {
	admins: [],
	reconnect: { enabled: true, initialDelayMs: 1_000, maxDelayMs: 60_000 },
	stream: { resumable: false, pingIntervalMs: 25_000 },
	outbound: {
		maxAttempts: 3,
		retryDelayMs: 500,
		minIntervalMs: 200,
		maxQueueSize: 1_000,
		maxMessageLength: 5_000,
		requestTimeoutMs: 10_000,
	},
	heartbeat: { enabled: false, intervalSec: 10 },
	logLevel: "info",
};

const ENV_PREFIX = "ROCKETCHAT_";

/** ROCKETCHAT_<key> → path in the raw config object */
const ENV_KEYS: ReadonlyArray<readonly [string, readonly string[]]> = [
	["SERVER_URI", ["serverUri"]],
	["LOGIN_USERNAME", ["username"]],
	["LOGIN_PASSWORD", ["password"]],
	["AUTH_TOKEN", ["authToken"]],
	["USER_ID", ["userId"]],
	["BOT_ADMINS", ["admins"]],
	["RECONNECT_ENABLED", ["reconnect", "enabled"]],
	["RECONNECT_INITIAL_DELAY_MS", ["reconnect", "initialDelayMs"]],
	["RECONNECT_MAX_DELAY_MS", ["reconnect", "maxDelayMs"]],
	["STREAM_RESUMABLE", ["stream", "resumable"]],
	["STREAM_PING_INTERVAL_MS", ["stream", "pingIntervalMs"]],
	["SEND_MAX_ATTEMPTS", ["outbound", "maxAttempts"]],
	["SEND_RETRY_DELAY_MS", ["outbound", "retryDelayMs"]],
	["SEND_MIN_INTERVAL_MS", ["outbound", "minIntervalMs"]],
	["MAX_MESSAGE_LENGTH", ["outbound", "maxMessageLength"]],
	["HEARTBEAT_ENABLED", ["heartbeat", "enabled"]],
	["HEARTBEAT_INTERVAL", ["heartbeat", "intervalSec"]],
	["BOT_LOG_LEVEL", ["logLevel"]],
];

/** "0", "false" and "no" (any case) are false; anything else non-empty is true. */
export function parseBool(value: unknown): unknown {
	if (typeof value !== "string") return value;
	const normalized = value.trim().toLowerCase();
	if (normalized === "") return false;
	return !["0", "false", "no"].includes(normalized);
}

const bool = z.preprocess(parseBool, z.boolean());
const count = z.coerce.number().int().positive();
const duration = z.coerce.number().int().nonnegative();

const rawConfigSchema = z.object({
	serverUri: z.string({ required_error: "Missing config `SERVER_URI`" }).trim().min(1, "Missing config `SERVER_URI`"),
	username: z.string().optional(),
	password: z.string().optional(),
	authToken: z.string().optional(),
	userId: z.string().optional(),
	admins: z.preprocess(
		(value) => (typeof value === "string" ? value.split(",") : value),
		z.array(z.string().trim()).transform((names) => names.filter((name) => name.length > 0)),
	),
	reconnect: z.object({
		enabled: bool,
		initialDelayMs: count,
		maxDelayMs: count,
	}),
	stream: z.object({
		resumable: bool,
		pingIntervalMs: duration,
	}),
	outbound: z.object({
		maxAttempts: count,
		retryDelayMs: duration,
		minIntervalMs: duration,
		maxQueueSize: count,
		maxMessageLength: count,
		requestTimeoutMs: count,
	}),
	heartbeat: z.object({
		enabled: bool,
		intervalSec: count,
	}),
	logLevel: z.preprocess((value) => (typeof value === "string" ? value.toLowerCase() : value), z.enum(LOG_LEVELS)),
});

type RawConfig = z.infer<typeof rawConfigSchema>;

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): BridgeConfig {
	const path = configPath ?? env.ROCKETCHAT_CONFIG ?? "./config/rocketchat.json";
	const resolved = resolve(path);

	let fileConfig: Record<string, unknown> = {};
	if (existsSync(resolved)) {
		fileConfig = readJsonObject(resolved);
	}

	const merged = deepMerge(deepMerge(DEFAULTS, fileConfig), envOverrides(env));

	const parsed = rawConfigSchema.safeParse(merged);
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
			.join("; ");
		throw new ConfigError(`Invalid configuration: ${issues}`, parsed.error);
	}

	return toBridgeConfig(parsed.data);
}

function toBridgeConfig(raw: RawConfig): BridgeConfig {
	const { serverUri, streamUrl } = deriveEndpoints(raw.serverUri);

	if (raw.reconnect.maxDelayMs < raw.reconnect.initialDelayMs) {
		throw new ConfigError("Config `RECONNECT_MAX_DELAY_MS` must not be below `RECONNECT_INITIAL_DELAY_MS`");
	}

	return {
		serverUri,
		streamUrl,
		credentials: resolveCredentials(raw),
		admins: raw.admins,
		reconnect: raw.reconnect,
		stream: raw.stream,
		outbound: raw.outbound,
		heartbeat: raw.heartbeat,
		logLevel: raw.logLevel,
	};
}

/** A personal access token wins over username/password when both are configured. */
function resolveCredentials(raw: RawConfig): Credentials {
	if (raw.authToken && raw.userId) {
		return { kind: "token", userId: raw.userId, authToken: raw.authToken };
	}
	if (!raw.username) {
		throw new ConfigError("Missing config `LOGIN_USERNAME`");
	}
	if (!raw.password) {
		throw new ConfigError("Missing config `LOGIN_PASSWORD`");
	}
	return { kind: "password", username: raw.username, password: raw.password };
}

/**
 * Accepts either the web address (http/https) or the DDP endpoint (ws/wss, usually ending in /websocket)
 * and returns both.
 */
export function deriveEndpoints(uri: string): { serverUri: string; streamUrl: string } {
	let url: URL;
	try {
		url = new URL(uri);
	} catch (err) {
		throw new ConfigError(`Malformed server URI: ${uri}`, err);
	}

	const secure = url.protocol === "https:" || url.protocol === "wss:";
	if (!["http:", "https:", "ws:", "wss:"].includes(url.protocol)) {
		throw new ConfigError(`Unsupported server URI scheme "${url.protocol}" in ${uri}`);
	}

	let basePath = url.pathname.replace(/\/+$/, "");
	if (url.protocol === "ws:" || url.protocol === "wss:") {
		basePath = basePath.replace(/\/websocket$/, "");
	}

	return {
		serverUri: `${secure ? "https" : "http"}://${url.host}${basePath}`,
		streamUrl: `${secure ? "wss" : "ws"}://${url.host}${basePath}/websocket`,
	};
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
	const overrides: Record<string, unknown> = {};
	for (const [key, path] of ENV_KEYS) {
		const value = env[ENV_PREFIX + key];
		if (value !== undefined) {
			setPath(overrides, path, value);
		}
	}
	return overrides;
}

function setPath(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
	let node = target;
	for (const key of path.slice(0, -1)) {
		const next = node[key];
		if (isRecord(next)) {
			node = next;
		} else {
			const created: Record<string, unknown> = {};
			node[key] = created;
			node = created;
		}
	}
	node[path[path.length - 1]] = value;
}

function readJsonObject(path: string): Record<string, unknown> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(readFileSync(path, "utf-8"));
	} catch (err) {
		throw new ConfigError(`Cannot read config file ${path}`, err);
	}
	if (!isRecord(parsed)) {
		throw new ConfigError(`Config file ${path} must contain a JSON object`);
	}
	return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
	const result = { ...target };
	for (const key of Object.keys(source)) {
		const sv = source[key];
		const tv = target[key];
		if (isRecord(sv) && isRecord(tv)) {
			result[key] = deepMerge(tv, sv);
		} else {
			result[key] = sv;
		}
	}
	return result;
}
