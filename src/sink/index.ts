import type { AppConfig } from "../config.js";
import { FileSystemSink } from "./filesystem.js";
import { S3Sink } from "./s3.js";
import type { ResultSink } from "./types.js";

export function createSink(config: Pick<AppConfig, "sink" | "fileExtension">): ResultSink {
  const { sink } = config;
  switch (sink.type) {
    case "filesystem":
      return new FileSystemSink({ dir: sink.dir, extension: config.fileExtension });
    case "s3":
      return new S3Sink({
        bucket: sink.bucket,
        prefix: sink.prefix,
        extension: config.fileExtension,
        ...(sink.region ? { region: sink.region } : {}),
      });
  }
}

export { FileSystemSink } from "./filesystem.js";
export { S3Sink } from "./s3.js";
export * from "./types.js";
