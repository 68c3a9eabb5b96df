import type {
  AuthenticityReport,
  HealthResponse,
  LinesResponse,
  QuickCheckResponse,
  UploadOptions,
} from './types.js';

export interface AuthenticityClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

export class AuthenticityClientError extends Error {
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'AuthenticityClientError';
    this.status = status;
  }
}

type AnalyzeFormat = 'report' | 'lines' | 'quick';

export class AuthenticityClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: AuthenticityClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  async analyze(file: Uint8Array, options: UploadOptions): Promise<AuthenticityReport> {
    return this.upload<AuthenticityReport>(file, options, 'report');
  }

  async analyzeLines(file: Uint8Array, options: UploadOptions): Promise<string[]> {
    const body = await this.upload<LinesResponse>(file, options, 'lines');
    return body.lines;
  }

  async quickCheck(file: Uint8Array, options: UploadOptions): Promise<string> {
    const body = await this.upload<QuickCheckResponse>(file, options, 'quick');
    return body.result;
  }

  async batch(directory: string): Promise<string[]> {
    if (!directory) {
      throw new Error('directory is required');
    }

    const response = await this.fetchImpl(`${this.baseUrl}/batch`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...this.defaultHeaders,
      },
      body: JSON.stringify({ directory }),
    });

    if (response.status === 404) {
      throw new AuthenticityClientError(`Directory not found: ${directory}`, 404);
    }
    const body = await this.readJson<LinesResponse>(response, 'Batch request');
    return body.lines;
  }

  async health(): Promise<HealthResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/health`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });
    return this.readJson<HealthResponse>(response, 'Health request');
  }

  private async upload<T>(file: Uint8Array, options: UploadOptions, format: AnalyzeFormat): Promise<T> {
    const form = new FormData();
    const blob = new Blob([new Uint8Array(file)], {
      type: options.contentType ?? 'application/octet-stream',
    });
    form.append('image', blob, options.fileName);

    const query = format === 'report' ? '' : `?format=${format}`;
    const response = await this.fetchImpl(`${this.baseUrl}/analyze${query}`, {
      method: 'POST',
      headers: this.defaultHeaders,
      body: form,
    });

    return this.readJson<T>(response, 'Analyze request');
  }

  private async readJson<T>(response: Response, label: string): Promise<T> {
    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new AuthenticityClientError(`${label} failed with ${response.status}: ${body}`, response.status);
    }
    return (await response.json()) as T;
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      return text || '<empty>';
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

export * from './types.js';
