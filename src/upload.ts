import type { Logger } from './logger';
import { AllEndpointsExhaustedError, EndpointFailedError, errorMessage } from './errors';
import type { HostingEndpoint } from './hosting';
import type { MediaArtifact, Result } from './types';

export type UploadResult = Result<{ url: string; endpoint: string }, AllEndpointsExhaustedError>;

export interface Uploader {
  upload(artifact: MediaArtifact): Promise<UploadResult>;
}

/**
 * Offers an artifact to each endpoint in order and stops at the first URL.
 * Endpoint health is not remembered between calls.
 */
export class UploadDispatcher implements Uploader {
  constructor(
    private readonly endpoints: readonly HostingEndpoint[],
    private readonly logger: Logger,
  ) {
    if (endpoints.length === 0) {
      throw new Error('UploadDispatcher needs at least one endpoint');
    }
  }

  async upload(artifact: MediaArtifact): Promise<UploadResult> {
    const failures: EndpointFailedError[] = [];

    for (const endpoint of this.endpoints) {
      const started = Date.now();
      try {
        const url = await endpoint.upload(artifact);
        this.logger.info(
          { endpoint: endpoint.name, url, sizeBytes: artifact.sizeBytes, duration: Date.now() - started },
          'Upload succeeded',
        );
        return { ok: true, value: { url, endpoint: endpoint.name } };
      } catch (err) {
        const failure =
          err instanceof EndpointFailedError ? err : new EndpointFailedError(endpoint.name, errorMessage(err), err);
        failures.push(failure);
        this.logger.warn(
          { endpoint: endpoint.name, reason: failure.reason, duration: Date.now() - started },
          'Upload endpoint failed',
        );
      }
    }

    return { ok: false, error: new AllEndpointsExhaustedError(failures) };
  }
}
