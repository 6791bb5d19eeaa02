import type { LogCategory, LogStore } from "../store/LogStore.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type RuntimeEnvironment = "development" | "production" | "test";

export interface TagRecord {
  [key: string]: string | number | boolean | null | undefined;
}

export interface LogEvent {
  level: LogLevel;
  message: string;
  timestamp: Date;
  tags?: TagRecord;
  context?: Record<string, unknown>;
  error?: Error;
  runtime?: {
    environment: RuntimeEnvironment;
  };
}

export interface ProviderContext {
  environment: RuntimeEnvironment;
  release?: string;
}

export interface TelemetryProvider {
  name: string;
  setup?(context: ProviderContext): Promise<void> | void;
  log?(event: LogEvent): Promise<void> | void;
  flush?(): Promise<void> | void;
  shutdown?(): Promise<void> | void;
}

export interface LoggerConfig {
  environment?: RuntimeEnvironment;
  providers?: TelemetryProvider[];
  defaultTags?: TagRecord;
  minLevel?: LogLevel;
}

export interface LoggerScope {
  tags?: TagRecord;
  context?: Record<string, unknown>;
}

export interface LogOptions {
  tags?: TagRecord;
  context?: Record<string, unknown>;
  error?: Error;
}

export interface Logger {
  debug(message: string, options?: LogOptions): void;
  info(message: string, options?: LogOptions): void;
  warn(message: string, options?: LogOptions): void;
  error(message: string, options?: LogOptions): void;
  withTags(tags: TagRecord): Logger;
  child(scope: LoggerScope): Logger;
  flush(): Promise<void>;
}

export interface ConsoleProviderOptions {
  enableColors?: boolean;
  redactKeys?: string[];
  debug?: boolean;
}

export interface ConsolaProviderOptions {
  tag?: string;
  level?: number;
  fancy?: boolean;
  debug?: boolean;
}

export interface FileProviderOptions {
  /** Store category the provider appends to. */
  category: LogCategory;
  store: LogStore;
  timeZone?: string;
  minLevel?: LogLevel;
  onError?(error: unknown): void;
}
