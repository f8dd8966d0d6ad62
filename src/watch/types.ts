/**
 * types.ts
 *
 * Shared TypeScript types used across the watch modules.
 *
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type WatchConfig = {
    baseUrl: string;
    cookieHeader: string | null;
    timeoutMs: number;
    durationSeconds: number;
    intervalSeconds: number;
    targetSeconds: number | null;
    gapSeconds: number;
    maxCount: number | null;
    resourceIdOverride: number | null;
    onlyIncomplete: boolean;
    courseId: number | null;
    videoId: number | null;
    probe: boolean;
    templateFile: string;
  };

  export type Paths = {
    templatePath: string;
    outDir: string;
    resultsPath: string;
  };

  // Parsed operator-supplied JSON with placeholder strings inside it.
  export type RequestTemplate = JsonValue;

  export type ResourceRef = {
    videoId: number;
    name?: string;
  };

  export type VideoItem = {
    id: number;
    name: string;
    url: string;
    incomplete: boolean | null;
  };

  export type ResourceContext = {
    readonly courseId: number | null;
    readonly contextInstanceId: number | null;
    readonly videoId: number;
    readonly resourceId: number;
    readonly sessionKey: string;
    readonly name: string | null;
    readonly declaredDurationSeconds: number | null;
    readonly sessionTimeoutSeconds: number | null;
  };

  export type ManualOverrides = {
    resourceId?: number | null;
    sessionKey?: string | null;
  };

  export type ResolveField = 'resourceId' | 'sessionKey';

  export type ResolveResult =
    | { ok: true; context: ResourceContext; sources: Record<ResolveField, string> }
    | { ok: false; missing: ResolveField[]; tried: string[]; error: string };

  export type SimulationState = {
    tick: number;
    watchedSeconds: number;
    targetSeconds: number;
    tickSeconds: number;
    elapsedWallSeconds: number;
    finished: boolean;
  };

  export const TerminationSignal = {
    ReachedTarget: 'reached-target',
    ServerReportedComplete: 'server-reported-complete',
    ExhaustedDuration: 'exhausted-duration',
    ResolutionFailed: 'resolution-failed',
    TransportError: 'transport-error',
    Cancelled: 'cancelled',
  } as const;

  export type TerminationSignal = (typeof TerminationSignal)[keyof typeof TerminationSignal];

  export type TerminalState = 'completed' | 'failed';

  export type SimulationOutcome = {
    signal: TerminationSignal;
    state: TerminalState;
    ticks: number;
    watchedSeconds: number;
    targetSeconds: number;
    detail?: string;
    lastReply?: string;
  };

  export type BatchEntry = {
    resource: ResourceRef;
    outcome: SimulationOutcome;
  };

  export type ServiceReply = {
    status: number;
    raw: string;
    json: unknown;
  };

  export type ServiceCall = {
    index: number;
    methodname: string;
    args: JsonObject;
  };

  export type PostOptions = {
    sesskey: string;
    timestampMs?: number;
    info?: string;
  };

  // What the engine needs from the HTTP layer. MoodleClient is the real one.
  export interface MoodleSession {
    fetchPage(path: string): Promise<string>;
    postService(body: JsonValue, opts: PostOptions): Promise<ServiceReply>;
    lookupModuleInstance(cmid: number, sesskey: string): Promise<number | null>;
  }

  export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
