export class PagelensError extends Error {
  url?: string;
  suggestions: string[];

  constructor(message: string, url?: string, suggestions: string[] = []) {
    super(message);
    this.name = 'PagelensError';
    this.url = url;
    this.suggestions = suggestions;
  }
}

/**
 * The primary page request could not complete (DNS, connection, reset, ...)
 */
export class NetworkError extends PagelensError {
  code?: string;

  constructor(message: string, options?: { code?: string; url?: string; suggestions?: string[] }) {
    const suggestions = options?.suggestions ?? [
      'Confirm the host is reachable from this environment.',
      'Check proxy/VPN/firewall settings that might block the request.',
    ];
    super(message, options?.url, suggestions);
    this.name = 'NetworkError';
    this.code = options?.code;
  }
}

/**
 * The server answered with a non-2xx status
 */
export class HttpError extends NetworkError {
  status: number;
  statusText: string;

  constructor(status: number, statusText: string, url?: string) {
    super(`Request failed with status code ${status} ${statusText}`.trim(), {
      code: `HTTP_${status}`,
      url,
      suggestions: [
        'Check that the URL points to a public HTML page.',
        status === 403 || status === 429
          ? 'The site may be blocking automated requests.'
          : 'Open the URL in a browser to compare the response.',
      ],
    });
    this.name = 'HttpError';
    this.status = status;
    this.statusText = statusText;
  }
}

/**
 * The request did not finish within its fixed time budget
 */
export class TimeoutError extends NetworkError {
  timeout: number;

  constructor(timeout: number, url?: string) {
    super(`Request timed out after ${timeout}ms`, {
      code: 'ETIMEDOUT',
      url,
      suggestions: [
        'Verify network connectivity and DNS resolution for the target host.',
        'The server may be slow; try again later.',
      ],
    });
    this.name = 'TimeoutError';
    this.timeout = timeout;
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends PagelensError {
  field?: string;
  value?: unknown;

  constructor(
    message: string,
    options?: {
      field?: string;
      value?: unknown;
    }
  ) {
    super(
      message,
      undefined,
      [
        'Include the scheme, e.g. https://example.com',
        'Only http and https URLs are supported.',
      ]
    );
    this.name = 'ValidationError';
    this.field = options?.field;
    this.value = options?.value;
  }
}

/**
 * Error thrown when a fetched body cannot be turned into the expected shape
 */
export class ParseError extends PagelensError {
  format?: string;

  constructor(
    message: string,
    options?: {
      format?: string;
      url?: string;
    }
  ) {
    super(
      message,
      options?.url,
      [
        'Verify the input is in the expected format.',
        'Ensure the encoding is correct (UTF-8, etc.).',
      ]
    );
    this.name = 'ParseError';
    this.format = options?.format;
  }
}
