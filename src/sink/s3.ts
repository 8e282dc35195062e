/**
 * Object storage sink: one S3 object per identifier under a key prefix.
 */

import { PutObjectCommand, S3Client, type PutObjectCommandInput } from "@aws-sdk/client-s3";
import { errorMessage } from "../errors.js";
import type { ResultSink, StoreResult } from "./types.js";
import { toStorageName } from "./types.js";

export interface S3SinkOptions {
  bucket: string;
  /** Key prefix; a trailing "/" is added when missing */
  prefix?: string;
  region?: string;
  extension?: string;
  contentType?: string;
  client?: S3Client;
}

const normalizePrefix = (prefix?: string): string => {
  if (!prefix) return "";
  const trimmed = prefix.replace(/\\/g, "/").replace(/^\/+/, "");
  if (!trimmed) return "";
  return trimmed.endsWith("/") ? trimmed : `${trimmed}/`;
};

export class S3Sink implements ResultSink {
  public readonly target: string;
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;
  private readonly extension: string;
  private readonly contentType: string;

  constructor(options: S3SinkOptions) {
    this.bucket = options.bucket;
    this.prefix = normalizePrefix(options.prefix);
    this.extension = options.extension ?? ".xml";
    this.contentType = options.contentType ?? "application/xml";
    this.client = options.client ?? new S3Client(options.region ? { region: options.region } : {});
    this.target = `s3://${this.bucket}/${this.prefix}`;
  }

  keyFor(identifier: string): string {
    return `${this.prefix}${toStorageName(identifier, this.extension)}`;
  }

  /** PutObject replaces any existing object under the same key. */
  async store(identifier: string, content: string): Promise<StoreResult> {
    const key = this.keyFor(identifier);
    const input: PutObjectCommandInput = {
      Bucket: this.bucket,
      Key: key,
      Body: Buffer.from(content, "utf-8"),
      ContentType: this.contentType,
    };

    try {
      await this.client.send(new PutObjectCommand(input));
      return { ok: true, location: `s3://${this.bucket}/${key}` };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }
}
