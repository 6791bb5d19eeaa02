import type { ErrorRecordPayload } from "../ingest/types.js";
import {
  validatePlayerConfig,
  type ConfigIssue,
  type PlayerSettings,
} from "./config-check.js";

type Listener = (event: unknown) => void;

export type ListenerTarget = {
  addEventListener(type: string, listener: Listener): void;
  removeEventListener(type: string, listener: Listener): void;
};

type FetchInit = {
  method: "POST";
  headers: Record<string, string>;
  body: string;
  keepalive?: boolean;
};

export type FetchLike = (input: string, init: FetchInit) => Promise<unknown>;

export type ReporterConsole = {
  log: (...args: unknown[]) => void;
  group?: (...args: unknown[]) => void;
  groupEnd?: () => void;
};

type BrowserGlobals = Partial<ListenerTarget> & {
  fetch?: FetchLike;
  console?: ReporterConsole;
  location?: { href?: string };
  navigator?: { userAgent?: string };
};

export interface ReporterOptions extends PlayerSettings {
  /** Ingestion route, relative to the page origin or absolute. */
  endpoint?: string;
  enabled?: boolean;
  /** Print transport failures to the console. */
  debug?: boolean;
  /** Echo every report to the console as a group. */
  logToConsole?: boolean;
  /** Zone used for the client-local timestamp. */
  timeZone?: string;
  fetch?: FetchLike;
  target?: ListenerTarget;
  console?: ReporterConsole;
  location?: { href?: string };
  navigator?: { userAgent?: string };
}

const browser = (): BrowserGlobals => globalThis as unknown as BrowserGlobals;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const resolveTarget = (): ListenerTarget | undefined => {
  const g = browser();
  if (typeof g.addEventListener !== "function" || typeof g.removeEventListener !== "function") {
    return undefined;
  }
  return {
    addEventListener: g.addEventListener.bind(g),
    removeEventListener: g.removeEventListener.bind(g),
  };
};

// One reporter per event target, so a second install never doubles reports.
const installedReporters = new WeakMap<object, ErrorReporter>();

const safeStringify = (value: unknown): string => {
  if (typeof value === "string") return value;
  try {
    const json = JSON.stringify(value);
    if (json !== undefined && json !== "{}") return json;
  } catch {
    // circular structures fall through to String()
  }
  return String(value);
};

/**
 * Pulls a message and, where there is one, a stack out of any thrown value.
 */
export function describeFailure(error: unknown): { message: string; stack?: string } {
  let message: string;
  let stack: string | undefined;

  if (error instanceof Error) {
    message = error.message || error.toString();
    stack = error.stack;
  } else if (isRecord(error) && "message" in error) {
    message = safeStringify(error.message);
    stack = typeof error.stack === "string" ? error.stack : undefined;
  } else {
    message = safeStringify(error);
  }

  return {
    message: message.trim() === "" ? "Unknown error" : message,
    ...(stack ? { stack } : {}),
  };
}

/**
 * Browser capture agent: turns uncaught errors, unhandled rejections and
 * explicit `report` calls into error records and posts them to the
 * ingestion route without ever waiting on, or failing because of, the
 * network.
 */
export class ErrorReporter {
  private readonly endpoint: string;
  private readonly enabled: boolean;
  private readonly debug: boolean;
  private readonly logToConsole: boolean;
  private readonly timeZone: string;
  private readonly settings: PlayerSettings;
  private readonly options: ReporterOptions;

  private readonly onError: Listener = (event) => {
    const details: Record<string, unknown> = isRecord(event) ? event : {};
    const failure = details.error ?? { message: details.message };
    const source =
      typeof details.filename === "string" && details.filename
        ? details.filename
        : "Unknown file";
    this.report(failure, source, "Global Error Handler");
  };

  private readonly onRejection: Listener = (event) => {
    const reason = isRecord(event) ? event.reason : undefined;
    this.report(reason, "Promise", "Unhandled Promise Rejection");
  };

  constructor(options: ReporterOptions = {}) {
    this.options = options;
    this.endpoint = options.endpoint ?? "/logger";
    this.enabled = options.enabled ?? true;
    this.debug = options.debug ?? false;
    this.logToConsole = options.logToConsole ?? true;
    this.timeZone = options.timeZone ?? "Europe/London";
    this.settings = { dns: options.dns, cors: options.cors, https: options.https };
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Registers the `error` and `unhandledrejection` listeners. Calling it again,
   * on this or any other reporter for the same target, changes nothing.
   * @returns Whether listeners were added by this call.
   */
  installGlobalHandlers(): boolean {
    if (!this.enabled) return false;
    const target = this.options.target ?? resolveTarget();
    if (!target || installedReporters.has(this.targetKey(target))) return false;

    target.addEventListener("error", this.onError);
    target.addEventListener("unhandledrejection", this.onRejection);
    installedReporters.set(this.targetKey(target), this);
    return true;
  }

  uninstallGlobalHandlers(): void {
    const target = this.options.target ?? resolveTarget();
    if (!target || installedReporters.get(this.targetKey(target)) !== this) return;

    target.removeEventListener("error", this.onError);
    target.removeEventListener("unhandledrejection", this.onRejection);
    installedReporters.delete(this.targetKey(target));
  }

  /**
   * Reports a failure. Returns immediately; delivery happens in the
   * background and any error along the way is dropped.
   */
  report(error: unknown, source?: string, context?: string): void {
    if (!this.enabled) return;

    let payload: ErrorRecordPayload;
    try {
      payload = this.buildPayload(error, source, context);
      if (this.logToConsole) this.echo(payload);
    } catch {
      return;
    }

    this.send(payload);
  }

  /**
   * Checks the player settings and reports a summary when anything is off.
   */
  checkConfig(settings: PlayerSettings = this.settings): ConfigIssue[] {
    const issues = validatePlayerConfig(settings);
    if (issues.length === 0) {
      if (this.debug) this.console()?.log("Configuration validated successfully");
      return issues;
    }

    const output = this.console();
    if (output) {
      output.group?.("CONFIGURATION ISSUES DETECTED");
      for (const issue of issues) {
        output.log(`${issue.severity}:`, issue.message);
        output.log("  Setting:", issue.setting);
      }
      output.groupEnd?.();
    }

    this.report(
      { message: `${issues.length} configuration issue(s) detected` },
      "player-config",
      "Configuration Validation",
    );
    return issues;
  }

  buildPayload(error: unknown, source?: string, context?: string): ErrorRecordPayload {
    const { message, stack } = describeFailure(error);
    const g = browser();

    return {
      timestamp: this.timestamp(),
      message,
      source: source || "Unknown",
      context: context || "General",
      userAgent: (this.options.navigator ?? g.navigator)?.userAgent ?? "Unknown",
      url: (this.options.location ?? g.location)?.href ?? "Unknown",
      dns: this.settings.dns,
      cors: this.settings.cors,
      https: this.settings.https,
      ...(stack ? { stack } : {}),
    };
  }

  private send(payload: ErrorRecordPayload): void {
    const transport = this.options.fetch ?? browser().fetch;
    if (typeof transport !== "function") {
      this.note("No fetch implementation; error not sent to the server logger");
      return;
    }

    try {
      void transport(this.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        keepalive: true,
      }).catch(() => {
        this.note("Could not send error to the server logger");
      });
    } catch {
      this.note("Could not send error to the server logger");
    }
  }

  private timestamp(): string {
    const now = new Date();
    try {
      return now.toLocaleString("en-GB", { timeZone: this.timeZone, hour12: false });
    } catch {
      return now.toISOString();
    }
  }

  private echo(payload: ErrorRecordPayload): void {
    const output = this.console();
    if (!output) return;

    output.group?.("ERROR LOGGED");
    output.log("Timestamp:", payload.timestamp);
    output.log("Source:", payload.source);
    output.log("Context:", payload.context);
    output.log("Message:", payload.message);
    if (payload.stack) {
      output.log("Stack Trace:");
      output.log(payload.stack);
    }
    output.log("Configuration:");
    output.log("  DNS:", payload.dns);
    output.log("  CORS:", payload.cors);
    output.log("  HTTPS:", payload.https);
    output.groupEnd?.();
  }

  private note(message: string): void {
    if (!this.debug) return;
    try {
      this.console()?.log(`Note: ${message}`);
    } catch {
      // the console itself is unusable; nothing left to tell
    }
  }

  private console(): ReporterConsole | undefined {
    return this.options.console ?? browser().console;
  }

  private targetKey(target: ListenerTarget): object {
    return this.options.target ? target : globalThis;
  }
}

/**
 * Creates a reporter and installs its global handlers in one step.
 */
export function installErrorReporting(options: ReporterOptions = {}): ErrorReporter {
  const reporter = new ErrorReporter(options);
  reporter.installGlobalHandlers();
  return reporter;
}
