import fetch, { Response } from 'node-fetch';

export type ClientOptions = { baseUrl: string; apiKey?: string };

export type RecordJSON = {
  header: Record<string, string>;
  sections: Record<string, string>;
  source: string;
};

export type ExtractResponse = { request_id: string; record: RecordJSON; row: string[] };

export type CsvResponse = { csv: string; skipped: number };

export class ClientError extends Error {
  constructor(readonly status: number, readonly code: string, message: string) {
    super(message);
    this.name = 'ClientError';
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

async function failure(r: Response): Promise<ClientError> {
  const text = await r.text();
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    body = undefined;
  }
  const code = isRecord(body) && typeof body.error === 'string' ? body.error : 'http_error';
  const message = isRecord(body) && typeof body.message === 'string' ? body.message : text || r.statusText;
  return new ClientError(r.status, code, message);
}

export class ExtractorClient {
  constructor(private opts: ClientOptions) {}

  private headers() {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.opts.apiKey) h['authorization'] = `Bearer ${this.opts.apiKey}`;
    return h;
  }

  private async getJSON<T>(path: string): Promise<T> {
    const r = await fetch(`${this.opts.baseUrl}${path}`, { headers: this.headers() });
    if (!r.ok) throw await failure(r);
    const body: T = await r.json();
    return body;
  }

  async health(): Promise<{ ok: boolean }> {
    return this.getJSON('/health');
  }

  async columns(): Promise<string[]> {
    const body = await this.getJSON<{ columns: string[] }>('/columns');
    return body.columns;
  }

  async extract(name: string, data: Buffer): Promise<ExtractResponse> {
    const r = await fetch(`${this.opts.baseUrl}/extract`, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify({ name, data_base64: data.toString('base64') }),
    });
    if (!r.ok) throw await failure(r);
    const body: ExtractResponse = await r.json();
    return body;
  }

  async extractCsv(files: Array<{ name: string; data: Buffer }>): Promise<CsvResponse> {
    const r = await fetch(`${this.opts.baseUrl}/extract/csv`, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify({ files: files.map((f) => ({ name: f.name, data_base64: f.data.toString('base64') })) }),
    });
    if (!r.ok) throw await failure(r);
    return { csv: await r.text(), skipped: Number(r.headers.get('x-skipped-count') ?? 0) };
  }
}
