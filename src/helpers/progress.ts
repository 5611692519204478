import type { Print } from './prompt';
import type { UploadObserver } from '../types/upload';

const BAR_WIDTH = 30;

export interface ConsoleReporterOptions {
  /** User-facing output (plan, report) */
  print?: Print;
  /** Where progress goes; redrawn in place when `interactive` */
  progress?: NodeJS.WritableStream;
  interactive?: boolean;
}

export function renderProgressBar(done: number, total: number, width: number = BAR_WIDTH): string {
  const ratio = total === 0 ? 1 : Math.min(done / total, 1);
  const filled = Math.round(ratio * width);
  const percentage = Math.round(ratio * 100);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${done}/${total} ${String(percentage).padStart(3)}%`;
}

/**
 * Observer that draws upload progress and prints the final report
 */
export function createConsoleReporter(options: ConsoleReporterOptions = {}): UploadObserver {
  const {
    print = console.log,
    progress = process.stderr,
    interactive = Boolean(process.stderr.isTTY),
  } = options;
  let lineOpen = false;

  const endLine = () => {
    if (lineOpen) {
      progress.write('\n');
      lineOpen = false;
    }
  };

  return (event) => {
    switch (event.type) {
      case 'uploading':
        if (interactive) {
          progress.write(`\r${renderProgressBar(event.index, event.total)} ${event.file.name}\x1b[K`);
          lineOpen = true;
        } else {
          progress.write(`[${event.index + 1}/${event.total}] Uploading ${event.file.name}\n`);
        }
        break;

      case 'uploaded':
        if (interactive) {
          progress.write(`\r${renderProgressBar(event.index + 1, event.total)}\x1b[K`);
          lineOpen = true;
          if (event.index + 1 === event.total) endLine();
        }
        break;

      case 'aborted':
        print('Aborting.');
        break;

      case 'album-created':
        endLine();
        print('-'.repeat(50));
        print(`Album created with id: ${event.album.id}`);
        print(`Access the album here: ${event.album.url}`);
        break;

      case 'failed':
        endLine();
        break;

      default:
        break;
    }
  };
}
