export interface PlayerSettings {
  /** Stream provider base URL, e.g. "http://iptv.example.test:8080". */
  dns?: string;
  /** Streams are fetched through the same-origin proxy. */
  cors?: boolean;
  https?: boolean;
}

export type ConfigIssueSeverity = "WARNING" | "ERROR";

export interface ConfigIssue {
  severity: ConfigIssueSeverity;
  message: string;
  setting: string;
}

/** The provider URL shipped in the sample configuration. */
export const PLACEHOLDER_DNS = "http://domain.com:80";

/**
 * Flags player settings that were left at their shipped placeholders.
 */
export function validatePlayerConfig(settings: PlayerSettings): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const dns = settings.dns?.trim();
  const unconfigured = !dns || dns === PLACEHOLDER_DNS;

  if (unconfigured) {
    issues.push({
      severity: "WARNING",
      message: "DNS is set to default value. Please configure your IPTV provider URL.",
      setting: "dns",
    });
  }

  if (settings.cors === true && unconfigured) {
    issues.push({
      severity: "ERROR",
      message: "CORS is enabled but DNS is not configured. Player will not work.",
      setting: "dns and cors",
    });
  }

  return issues;
}
