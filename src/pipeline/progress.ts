import logger from '../utils/logger.js';

/**
 * Logs upload progress over a known number of photos.
 */
export class ProgressReporter {
  private done = 0;

  constructor(
    private readonly label: string,
    private readonly total: number,
  ) {
    logger.info(`${label}: ${total} ${total === 1 ? 'photo' : 'photos'} to upload`);
  }

  tick(fileName: string): void {
    this.done++;
    const percent = this.total === 0 ? 100 : Math.round((this.done / this.total) * 100);
    logger.info(`${this.label}: ${this.done}/${this.total} (${percent}%) ${fileName}`);
  }

  get completed(): number {
    return this.done;
  }
}
