import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { z } from "zod";
import {
  AuthError,
  NetworkError,
  RequestRejectedError,
  SessionExpiredError,
} from "../../utils/errors.js";
import { createChildLogger } from "../../utils/logger.js";

const log = createChildLogger("rocketchat-rest");

export interface RestAuth {
  authToken: string;
  userId: string;
}

export interface RequestSpec {
  method: "GET" | "POST";
  /** Path under /api/v1, e.g. "users.info" */
  path: string;
  query?: Record<string, string>;
  body?: unknown;
}

export interface RestClientOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Replaces the HTTP transport; tests use it to answer in-process */
  adapter?: AxiosAdapter;
}

const loginResponseSchema = z.object({
  status: z.string().optional(),
  data: z.object({
    authToken: z.string(),
    userId: z.string(),
    me: z
      .object({
        _id: z.string().optional(),
        username: z.string(),
        name: z.string().optional(),
      })
      .passthrough()
      .optional(),
  }),
});

const userSchema = z
  .object({
    _id: z.string(),
    username: z.string(),
    name: z.string().optional(),
  })
  .passthrough();

export type WireUser = z.infer<typeof userSchema>;

const roomSchema = z
  .object({
    _id: z.string(),
    t: z.string().optional(),
    name: z.string().optional(),
    fname: z.string().optional(),
    usernames: z.array(z.string()).optional(),
  })
  .passthrough();

export type WireRoom = z.infer<typeof roomSchema>;

const sentMessageSchema = z.object({
  message: z
    .object({
      _id: z.string(),
      rid: z.string(),
    })
    .passthrough(),
});

const directRoomSchema = z.object({
  room: z
    .object({
      _id: z.string(),
      rid: z.string().optional(),
    })
    .passthrough(),
});

const syncMessagesSchema = z.object({
  result: z.object({
    updated: z.array(z.unknown()).default([]),
  }),
});

const historyEntrySchema = z.object({
  ts: z.union([z.string(), z.object({ $date: z.number() })]),
});

function postedAt(message: unknown): number | undefined {
  const entry = historyEntrySchema.safeParse(message);
  if (!entry.success) return undefined;
  const at = typeof entry.data.ts === "string" ? Date.parse(entry.data.ts) : entry.data.ts.$date;
  return Number.isNaN(at) ? undefined : at;
}

export interface LoginResult extends RestAuth {
  username: string;
  displayName?: string;
}

/**
 * Thin wrapper around the Rocket.Chat REST API (/api/v1).
 * Centralizes auth headers and maps HTTP failures onto the bridge error taxonomy.
 */
export class RestClient {
  private readonly http: AxiosInstance;

  constructor(options: RestClientOptions) {
    this.http = axios.create({
      baseURL: `${options.baseUrl}/api/v1/`,
      timeout: options.timeoutMs,
      adapter: options.adapter,
      headers: { "Content-Type": "application/json" },
    });
  }

  /** Generic authenticated call. A 401 means the token is no longer valid. */
  async request<T>(spec: RequestSpec, auth: RestAuth): Promise<T> {
    try {
      const res = await this.http.request<T>({
        method: spec.method,
        url: spec.path,
        params: spec.query,
        data: spec.body,
        headers: {
          "X-Auth-Token": auth.authToken,
          "X-User-Id": auth.userId,
        },
      });
      return res.data;
    } catch (err) {
      throw mapHttpError(err, spec.path, "session");
    }
  }

  async login(username: string, password: string): Promise<LoginResult> {
    let data: unknown;
    try {
      const res = await this.http.post<unknown>("login", { user: username, password });
      data = res.data;
    } catch (err) {
      throw mapHttpError(err, "login", "login");
    }

    const parsed = parse(loginResponseSchema, data, "login");
    log.debug({ userId: parsed.data.userId }, "Logged in");
    return {
      authToken: parsed.data.authToken,
      userId: parsed.data.userId,
      username: parsed.data.me?.username ?? username,
      displayName: parsed.data.me?.name,
    };
  }

  /** Validates a personal access token and returns the owner. */
  async me(auth: RestAuth): Promise<WireUser> {
    let data: unknown;
    try {
      const res = await this.http.get<unknown>("me", {
        headers: { "X-Auth-Token": auth.authToken, "X-User-Id": auth.userId },
      });
      data = res.data;
    } catch (err) {
      throw mapHttpError(err, "me", "login");
    }
    return parse(userSchema, data, "me");
  }

  async userInfo(auth: RestAuth, userId: string): Promise<WireUser> {
    const data = await this.request<unknown>({ method: "GET", path: "users.info", query: { userId } }, auth);
    return parse(z.object({ user: userSchema }), data, "users.info").user;
  }

  async roomInfo(auth: RestAuth, roomId: string): Promise<WireRoom> {
    const data = await this.request<unknown>({ method: "GET", path: "rooms.info", query: { roomId } }, auth);
    return parse(z.object({ room: roomSchema }), data, "rooms.info").room;
  }

  async sendMessage(auth: RestAuth, message: unknown): Promise<{ messageId: string; roomId: string }> {
    const data = await this.request<unknown>({ method: "POST", path: "chat.sendMessage", body: { message } }, auth);
    const parsed = parse(sentMessageSchema, data, "chat.sendMessage");
    return { messageId: parsed.message._id, roomId: parsed.message.rid };
  }

  /** Opens (or returns the existing) direct room with a user. */
  async createDirectRoom(auth: RestAuth, username: string): Promise<string> {
    const data = await this.request<unknown>({ method: "POST", path: "im.create", body: { username } }, auth);
    const { room } = parse(directRoomSchema, data, "im.create");
    return room.rid ?? room._id;
  }

  /**
   * Messages of a room posted after `since`, oldest first. The server answers newest
   * first and also lists older messages that were merely updated; those are dropped.
   */
  async syncMessages(auth: RestAuth, roomId: string, since: Date): Promise<unknown[]> {
    const data = await this.request<unknown>(
      { method: "GET", path: "chat.syncMessages", query: { roomId, lastUpdate: since.toISOString() } },
      auth,
    );
    const after = since.getTime();
    return parse(syncMessagesSchema, data, "chat.syncMessages")
      .result.updated.flatMap((message) => {
        const at = postedAt(message);
        return at !== undefined && at > after ? [{ message, at }] : [];
      })
      .sort((a, b) => a.at - b.at)
      .map((entry) => entry.message);
  }

  async logout(auth: RestAuth): Promise<void> {
    await this.request<unknown>({ method: "POST", path: "logout" }, auth);
  }
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, endpoint: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new RequestRejectedError(`Unexpected response from ${endpoint}: ${result.error.message}`, 200, result.error);
  }
  return result.data;
}

/**
 * Transport failures, timeouts, 429 and 5xx are transient. A 401/403 at login is a
 * credential problem; a 401 anywhere else means the session expired.
 */
export function mapHttpError(err: unknown, endpoint: string, phase: "login" | "session"): Error {
  if (!axios.isAxiosError(err)) {
    return err instanceof Error ? err : new NetworkError(`${endpoint} failed: ${String(err)}`, err);
  }

  const status = err.response?.status;
  if (status === undefined) {
    return new NetworkError(`${endpoint} failed: ${err.code ?? err.message}`, err);
  }

  const reason = serverReason(err.response?.data) ?? `HTTP ${status}`;

  if (phase === "login" && (status === 401 || status === 403)) {
    return new AuthError(`Login rejected: ${reason}`, err);
  }
  if (status === 401) {
    return new SessionExpiredError(`${endpoint}: ${reason}`, err);
  }
  if (status === 429 || status >= 500) {
    return new NetworkError(`${endpoint} failed: ${reason}`, err);
  }
  return new RequestRejectedError(`${endpoint} rejected: ${reason}`, status, err);
}

const errorBodySchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
});

function serverReason(data: unknown): string | undefined {
  const body = errorBodySchema.safeParse(data);
  if (!body.success) return undefined;
  return body.data.error ?? body.data.message;
}
