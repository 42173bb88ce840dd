import { spawn } from 'child_process';
import { createInterface } from 'readline';
import {
  ArchiveError,
  ArchiveEvent,
  ArchiveEventSchema,
  CancelledError,
  EngineParams,
  EventSink,
  formatError
} from '@streamvault/shared';
import { DownloadEngine } from './types';

/**
 * Decodes one line of the downloader's JSON event output. Lines that are not
 * events are reported as null.
 */
export function parseEventLine(line: string): ArchiveEvent | null {
  const trimmed = line.trim();
  if (!trimmed) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    console.log(`[downloader] ${trimmed}`);
    return null;
  }

  const result = ArchiveEventSchema.safeParse(raw);
  if (!result.success) {
    console.warn(`Ignoring unrecognized downloader event: ${trimmed.slice(0, 200)}`);
    return null;
  }
  return result.data;
}

export function buildEngineArgs(params: EngineParams): string[] {
  const args = ['--json-events', '--poll-interval', String(params.pollInterval)];

  const options: Array<[string, string | number | undefined]> = [
    ['--output-directory', params.outputDirectory],
    ['--staging-directory', params.stagingDirectory],
    ['--output-template', params.outputTemplate],
    ['--ffmpeg-path', params.ffmpegPath],
    ['--po-token', params.poToken],
    ['--visitor-data', params.visitorData],
    ['--cookies', params.cookieFile],
    ['--max-video-resolution', params.maxVideoResolution],
    ['--num-parallel-downloads', params.numParallelDownloads]
  ];
  for (const [flag, value] of options) {
    if (value !== undefined) {
      args.push(flag, String(value));
    }
  }

  if (params.writeDescription) {
    args.push('--write-description');
  }
  if (params.writeThumbnail) {
    args.push('--write-thumbnail');
  }
  if (params.preferVp9) {
    args.push('--vp9');
  }

  args.push(params.url);
  return args;
}

/**
 * Runs an external downloader and forwards the JSON events it prints on
 * stdout, one per line, to the sink in the order they were written.
 */
export class ProcessEngine implements DownloadEngine {
  constructor(
    public readonly params: EngineParams,
    private command: string
  ) {}

  run(sink: EventSink, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      return Promise.reject(new CancelledError());
    }

    return new Promise((resolve, reject) => {
      const child = spawn(this.command, buildEngineArgs(this.params), {
        stdio: ['ignore', 'pipe', 'pipe']
      });

      let stderr = '';
      let delivery: Promise<void> = Promise.resolve();
      let deliveryError: unknown = null;

      const lines = createInterface({ input: child.stdout });
      lines.on('line', (line: string) => {
        const event = parseEventLine(line);
        if (!event) {
          return;
        }
        delivery = delivery
          .then(() => sink.handleEvent(event))
          .catch((error: unknown) => {
            deliveryError = deliveryError ?? error;
          });
      });

      child.stderr.on('data', (data: Buffer) => {
        // keep the tail only; the downloader can be chatty over a long broadcast
        stderr = (stderr + data.toString()).slice(-4000);
      });

      const onAbort = () => {
        child.kill('SIGTERM');
      };
      signal.addEventListener('abort', onAbort, { once: true });

      child.on('error', (error: Error) => {
        signal.removeEventListener('abort', onAbort);
        reject(new ArchiveError(`Failed to start downloader: ${error.message}`, 'ENGINE_START_FAILED'));
      });

      child.on('close', (code: number | null) => {
        signal.removeEventListener('abort', onAbort);
        delivery
          .then(() => {
            if (signal.aborted) {
              reject(new CancelledError());
            } else if (deliveryError) {
              reject(deliveryError);
            } else if (code === 0) {
              resolve();
            } else {
              reject(
                new ArchiveError(`Downloader exited with code ${code}: ${stderr.trim()}`, 'ENGINE_FAILED', {
                  code
                })
              );
            }
          })
          .catch((error: unknown) => reject(new ArchiveError(formatError(error), 'ENGINE_FAILED')));
      });
    });
  }
}
