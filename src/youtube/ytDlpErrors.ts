export type YtDlpFailureKind = "access" | "unavailable" | "transient" | "unknown";

export type YtDlpFailureReason =
  | "members_only"
  | "private"
  | "age_restricted"
  | "removed"
  | "geo_restricted"
  | "login_required"
  | "livestream"
  | "rate_limited"
  | "unknown";

export type YtDlpFailureInfo = {
  kind: YtDlpFailureKind;
  reason: YtDlpFailureReason;
  retryable: boolean;
  summary: string;
};

export class YtDlpError extends Error {
  constructor(
    public info: YtDlpFailureInfo,
    public details: { stderr: string; stdout: string }
  ) {
    super(info.summary);
    this.name = "YtDlpError";
  }
}

type Rule = {
  needles: string[];
  info: YtDlpFailureInfo;
};

// Order matters: the first rule with a matching needle wins. HTTP and network
// rules precede the removed-video rule.
const RULES: Rule[] = [
  {
    needles: [
      "members-only",
      "members only",
      "join this channel to get access",
      "available to this channel's members",
    ],
    info: {
      kind: "access",
      reason: "members_only",
      retryable: false,
      summary: "yt-dlp: members-only video (skipping)",
    },
  },
  {
    needles: ["private video", "this video is private"],
    info: {
      kind: "access",
      reason: "private",
      retryable: false,
      summary: "yt-dlp: private video (skipping)",
    },
  },
  {
    needles: ["sign in to confirm your age", "age-restricted", "age restricted"],
    info: {
      kind: "access",
      reason: "age_restricted",
      retryable: false,
      summary: "yt-dlp: age-restricted video (try --cookies or --browser)",
    },
  },
  {
    needles: [
      "this live event will begin",
      "premieres in",
      "is a livestream",
      "live stream recording is not available",
    ],
    info: {
      kind: "unavailable",
      reason: "livestream",
      retryable: false,
      summary: "yt-dlp: livestream or premiere (skipping)",
    },
  },
  {
    needles: ["http error 403", "403 forbidden", "sign in", "login required"],
    info: {
      kind: "access",
      reason: "login_required",
      retryable: true,
      summary: "yt-dlp: access denied (login required / 403)",
    },
  },
  {
    needles: ["http error 429", "too many requests", "rate limit"],
    info: {
      kind: "transient",
      reason: "rate_limited",
      retryable: true,
      summary: "yt-dlp: rate limited (429)",
    },
  },
  {
    needles: [
      "timed out",
      "timeout",
      "connection reset",
      "econnreset",
      "temporary failure",
      "tls",
    ],
    info: {
      kind: "transient",
      reason: "unknown",
      retryable: true,
      summary: "yt-dlp: transient network error",
    },
  },
  {
    needles: [
      "video unavailable",
      "this video is unavailable",
      "does not exist",
    ],
    info: {
      kind: "unavailable",
      reason: "removed",
      retryable: false,
      summary: "yt-dlp: video unavailable/removed",
    },
  },
  {
    needles: ["this video is not available in your country"],
    info: {
      kind: "access",
      reason: "geo_restricted",
      retryable: false,
      summary: "yt-dlp: geo-restricted video (skipping)",
    },
  },
];

function firstNonEmptyLine(text: string): string | undefined {
  for (const line of text.replace(/\r\n/g, "\n").split("\n")) {
    const trimmed = line.trim();
    if (trimmed.length > 0) return trimmed;
  }
  return undefined;
}

/**
 * Classify a failed yt-dlp run from its output. `retryable` tells the
 * downloader whether the simplified fallback attempt is worth making.
 */
export function parseYtDlpFailure(output: {
  stderr?: string;
  stdout?: string;
}): YtDlpFailureInfo | undefined {
  const text = `${output.stderr ?? ""}\n${output.stdout ?? ""}`.toLowerCase();

  for (const rule of RULES) {
    if (rule.needles.some((needle) => text.includes(needle))) {
      return { ...rule.info };
    }
  }

  const line =
    firstNonEmptyLine(output.stderr ?? "") ??
    firstNonEmptyLine(output.stdout ?? "");
  if (!line) return undefined;

  return {
    kind: "unknown",
    reason: "unknown",
    retryable: true,
    summary: `yt-dlp: ${line}`,
  };
}

export function ytDlpFailureFromResult(result: {
  stderr: string;
  stdout: string;
  exitCode: number;
}): YtDlpError {
  const info = parseYtDlpFailure(result) ?? {
    kind: "unknown",
    reason: "unknown",
    retryable: true,
    summary: `yt-dlp: exited with code ${result.exitCode}`,
  };
  return new YtDlpError(info, { stderr: result.stderr, stdout: result.stdout });
}
