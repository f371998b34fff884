import fs from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import axios, { type AxiosInstance } from 'axios';
import mime from 'mime';
import type { AppConfig, EndpointName } from './env';
import { EndpointFailedError, errorMessage } from './errors';
import { createR2Bucket, type R2Bucket } from './r2';
import type { MediaArtifact } from './types';

/** A file host. upload() resolves to a public URL or throws EndpointFailedError. */
export interface HostingEndpoint {
  readonly name: string;
  upload(artifact: MediaArtifact): Promise<string>;
}

export function contentTypeFor(filePath: string): string {
  return mime.getType(filePath) ?? 'application/octet-stream';
}

export type MultipartEndpointOptions = {
  name: string;
  url: string;
  fileField: string;
  fields?: Record<string, string>;
  timeoutMs: number;
  http?: AxiosInstance;
};

/**
 * Hosts that take a single multipart POST and answer with the file URL as
 * plain text. Only a 200 with a non-empty body counts as success.
 */
export class MultipartEndpoint implements HostingEndpoint {
  readonly name: string;
  private readonly http: AxiosInstance;

  constructor(private readonly options: MultipartEndpointOptions) {
    this.name = options.name;
    this.http = options.http ?? axios.create();
  }

  async upload(artifact: MediaArtifact): Promise<string> {
    const body = await fs.readFile(artifact.path);
    const form = new FormData();
    for (const [key, value] of Object.entries(this.options.fields ?? {})) {
      form.append(key, value);
    }
    form.append(
      this.options.fileField,
      new Blob([body], { type: contentTypeFor(artifact.path) }),
      path.basename(artifact.path),
    );

    let status: number;
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(this.options.url, form, {
        timeout: this.options.timeoutMs,
        responseType: 'text',
        validateStatus: () => true,
        maxBodyLength: Infinity,
      });
      status = response.status;
      data = response.data;
    } catch (err) {
      const reason = axios.isAxiosError(err) ? (err.code ?? err.message) : String(err);
      throw new EndpointFailedError(this.name, reason, err);
    }

    if (status !== 200) {
      throw new EndpointFailedError(this.name, `HTTP ${status}`);
    }
    const url = typeof data === 'string' ? data.trim() : '';
    if (!url) {
      throw new EndpointFailedError(this.name, 'empty response body');
    }
    return url;
  }
}

export class R2Endpoint implements HostingEndpoint {
  readonly name = 'r2';

  constructor(
    private readonly bucket: R2Bucket,
    private readonly newId: () => string = randomUUID,
  ) {}

  async upload(artifact: MediaArtifact): Promise<string> {
    const body = await fs.readFile(artifact.path);
    const key = `gifs/${this.newId()}-${path.basename(artifact.path)}`;
    try {
      await this.bucket.putObject(key, body, contentTypeFor(artifact.path));
    } catch (err) {
      throw new EndpointFailedError(this.name, errorMessage(err), err);
    }
    return `${this.bucket.publicBaseUrl}/${key}`;
  }
}

export function createEndpoint(
  name: EndpointName,
  config: Pick<AppConfig, 'catboxUrl' | 'zeroX0Url' | 'uploadTimeoutMs' | 'r2'>,
  http?: AxiosInstance,
): HostingEndpoint {
  switch (name) {
    case 'catbox':
      return new MultipartEndpoint({
        name,
        url: config.catboxUrl,
        fields: { reqtype: 'fileupload' },
        fileField: 'fileToUpload',
        timeoutMs: config.uploadTimeoutMs,
        http,
      });
    case '0x0':
      return new MultipartEndpoint({
        name,
        url: config.zeroX0Url,
        fileField: 'file',
        timeoutMs: config.uploadTimeoutMs,
        http,
      });
    case 'r2':
      if (!config.r2) throw new Error('r2 endpoint requested without R2 configuration');
      return new R2Endpoint(createR2Bucket(config.r2));
  }
}
