/**
 * URL validation utilities to prevent SSRF (Server-Side Request Forgery) attacks.
 */

export interface UrlValidationOptions {
  /**
   * Allow private/internal IP addresses (default: false).
   * WARNING: Enabling this can expose your application to SSRF attacks.
   */
  allowPrivateIPs?: boolean;

  /**
   * Allow localhost addresses (default: false).
   * WARNING: Enabling this can expose your application to SSRF attacks.
   */
  allowLocalhost?: boolean;

  /**
   * Allowed protocols (default: `["http:", "https:"]`).
   */
  allowedProtocols?: string[];

  /**
   * Disable URL validation entirely (default: false).
   * WARNING: This completely disables SSRF protection.
   */
  disableValidation?: boolean;
}

export class SSRFError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SSRFError";
  }
}

const PRIVATE_HOST_PATTERNS = [/^fc00:/i, /^fe80:/i, /^fd/i];

const PRIVATE_IPV4_RANGES: ReadonlyArray<{
  matches: (a: number, b: number) => boolean;
  message: string;
}> = [
  {
    matches: (a) => a === 10,
    message: "Private IP addresses (10.x.x.x) are not allowed for security reasons.",
  },
  {
    matches: (a, b) => a === 172 && b >= 16 && b <= 31,
    message: "Private IP addresses (172.16-31.x.x) are not allowed for security reasons.",
  },
  {
    matches: (a, b) => a === 192 && b === 168,
    message: "Private IP addresses (192.168.x.x) are not allowed for security reasons.",
  },
  {
    matches: (a, b) => a === 169 && b === 254,
    message: "Link-local addresses (169.254.x.x) are not allowed for security reasons.",
  },
];

function parseUrl(url: string): URL {
  if (!url || typeof url !== "string") {
    throw new SSRFError("URL must be a non-empty string");
  }
  try {
    return new URL(url);
  } catch (error) {
    throw new SSRFError(`Invalid URL format: ${url}`);
  }
}

function isLocalhost(hostname: string): boolean {
  return (
    hostname === "localhost" ||
    hostname === "::1" ||
    hostname === "0.0.0.0" ||
    hostname.startsWith("127.")
  );
}

function assertPublicHost(hostname: string): void {
  const isIPv6 = hostname.includes(":");
  if (isIPv6 && PRIVATE_HOST_PATTERNS.some((pattern) => pattern.test(hostname))) {
    throw new SSRFError(
      "Private/internal IP addresses are not allowed for security reasons. Set allowPrivateIPs=true to override."
    );
  }
  if (!/^\d+\.\d+\.\d+\.\d+$/.test(hostname)) {
    return;
  }
  const [a, b] = hostname.split(".").map(Number);
  const range = PRIVATE_IPV4_RANGES.find(({ matches }) => matches(a, b));
  if (range) {
    throw new SSRFError(range.message);
  }
}

/**
 * Validates a URL to prevent SSRF attacks.
 *
 * @param url - The URL to validate
 * @param options - Validation options
 * @throws {SSRFError} If the URL is invalid or potentially dangerous
 */
export function validateUrl(
  url: string,
  options: UrlValidationOptions = {}
): void {
  const {
    allowPrivateIPs = false,
    allowLocalhost = false,
    allowedProtocols = ["http:", "https:"],
    disableValidation = false,
  } = options;

  if (disableValidation) {
    return;
  }

  const parsedUrl = parseUrl(url);

  const protocol = parsedUrl.protocol.toLowerCase();
  if (!allowedProtocols.includes(protocol)) {
    throw new SSRFError(
      `Protocol "${protocol}" is not allowed. Only ${allowedProtocols.join(", ")} are permitted.`
    );
  }

  // IPv6 hosts come bracketed, e.g. "[::1]"
  const hostname = parsedUrl.hostname.toLowerCase().replace(/^\[|\]$/g, "");

  if (!allowLocalhost && isLocalhost(hostname)) {
    throw new SSRFError(
      "Localhost addresses are not allowed for security reasons. Set allowLocalhost=true to override."
    );
  }

  if (!allowPrivateIPs) {
    assertPublicHost(hostname);
  }
}
