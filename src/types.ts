export type MediaFormat = 'source' | 'gif';

export type MediaArtifact = {
  path: string;
  sizeBytes: number;
  format: MediaFormat; // 'source' = the file as it was received
};

// Why the original file went out unconverted
export type PassthroughReason = 'tool-unavailable' | 'conversion-failed';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type GifJobData = {
  chatId: number;
  replyToMessageId: number; // the user's message
  statusMessageId: number; // the bot's "Processing..." reply, edited as the job advances
  fileId: string;
  fileName: string;
};

export type GifJobStatus = 'delivered' | 'upload-failed' | 'failed';

export type GifJobResult = {
  status: GifJobStatus;
  url?: string;
  endpoint?: string;
  sizeBytes?: number;
  format?: MediaFormat;
  profile?: string | null; // null when the original was passed through
  withinBudget?: boolean;
  passthrough?: PassthroughReason;
  error?: string;
};
