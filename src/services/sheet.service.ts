import { InputError } from '../middleware/error.middleware';
import { SheetConfig } from '../types/config.types';
import { logger } from '../utils/logger';

const SHEET_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export type FetchLike = (url: string) => Promise<{
  ok: boolean;
  status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}>;

/**
 * Downloads a shared online sheet as workbook bytes through its export URL
 */
export class SheetService {
  private readonly options: SheetConfig;
  private readonly fetchFn: FetchLike;

  constructor(options: SheetConfig, fetchFn: FetchLike = (url) => fetch(url)) {
    this.options = options;
    this.fetchFn = fetchFn;
  }

  exportUrl(sheetId: string): string {
    return this.options.exportUrl.replace('{id}', encodeURIComponent(sheetId));
  }

  async fetchWorkbook(sheetId: string): Promise<Buffer> {
    if (!SHEET_ID_PATTERN.test(sheetId)) {
      throw new InputError(`Invalid sheet id '${sheetId}'`);
    }

    let response: Awaited<ReturnType<FetchLike>>;
    try {
      response = await this.fetchFn(this.exportUrl(sheetId));
    } catch (error) {
      logger.warn('Sheet download failed', {
        sheetId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new InputError(`Unable to download sheet '${sheetId}'`);
    }

    if (!response.ok) {
      throw new InputError(
        `Unable to download sheet '${sheetId}' (status ${response.status}). ` +
          'Check that the sheet is shared for viewing.'
      );
    }

    return Buffer.from(await response.arrayBuffer());
  }
}
