import { S3Client, PutObjectCommand } from '@aws-sdk/client-s3';
import type { R2Config } from './env';

// Upload one object.
// key is the object key
// body is the file content
// contentType is the object's Content-Type
export type PutObject = (key: string, body: Buffer, contentType?: string) => Promise<void>;

// What the R2 endpoint needs from a bucket
export type R2Bucket = {
  bucket: string;
  publicBaseUrl: string; // objects are served at <publicBaseUrl>/<key>
  putObject: PutObject;
};

// Create the bucket client for R2
export function createR2Bucket(config: R2Config): R2Bucket {
  // Create the S3 client (R2 speaks the S3 API)
  const s3 = new S3Client({
    region: 'auto',
    endpoint: config.endpoint,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
    forcePathStyle: true,
  });

  return {
    bucket: config.bucket,
    publicBaseUrl: config.publicBaseUrl,
    // Upload the GIF to R2
    async putObject(key, body, contentType) {
      await s3.send(
        new PutObjectCommand({
          Bucket: config.bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
        }),
      );
    },
  };
}
