import type { VideoMetadataRecord } from '../core/types';

export interface RecordWriter {
  /** Where the records go, for logs */
  readonly location: string;
  /** Records persisted so far */
  readonly written: number;
  /** Persist one record. Rejects with WriteError when the sink fails */
  write(record: VideoMetadataRecord): Promise<void>;
  close(): Promise<void>;
}
