import { google, sheets_v4 } from 'googleapis';
import { SheetRow } from '@/lib/types/call-log';

export const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

export interface SheetWriter {
  /**
   * Overwrite a range with the given rows. Resolves to the number of updated cells.
   */
  writeRange(range: string, values: SheetRow[]): Promise<number>;
}

export class GoogleSheetsService implements SheetWriter {
  private spreadsheetId: string;
  private sheets: sheets_v4.Sheets;

  constructor(config: { serviceAccountFile: string; spreadsheetId: string }) {
    this.spreadsheetId = config.spreadsheetId;
    const auth = new google.auth.GoogleAuth({
      keyFile: config.serviceAccountFile,
      scopes: SHEETS_SCOPES,
    });
    this.sheets = google.sheets({ version: 'v4', auth });
  }

  async writeRange(range: string, values: SheetRow[]): Promise<number> {
    const result = await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range,
      // Let Sheets parse numbers, dates and formulas as if typed in
      valueInputOption: 'USER_ENTERED',
      requestBody: { values },
    });

    return result.data.updatedCells ?? 0;
  }
}
