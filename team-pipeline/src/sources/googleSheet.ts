/**
 * Reads the roster worksheet through the Google Sheets v4 API.
 * Credentials come from a service account key file (GOOGLE_APPLICATION_CREDENTIALS).
 */

import { google } from 'googleapis';
import { ConfigurationError } from '../utils/errors.js';
import { toRowBatch, type RowSource } from './rowSource.js';
import type { RowBatch } from '../types/Member.js';

export interface GoogleSheetSourceOptions {
  sheetId?: string;
  worksheetName?: string;
  credentialsPath?: string;
  timeoutMs: number;
}

export class GoogleSheetSource implements RowSource {
  readonly description: string;

  constructor(private readonly options: GoogleSheetSourceOptions) {
    this.description = `Google Sheet ${options.sheetId ?? '(unset)'} / ${options.worksheetName ?? '(unset)'}`;
  }

  async readRows(): Promise<RowBatch> {
    const { sheetId, worksheetName, credentialsPath, timeoutMs } = this.options;
    if (!sheetId || !worksheetName) {
      throw new ConfigurationError('TEAM_SHEET_ID and TEAM_WORKSHEET_NAME must be set in .env');
    }

    const auth = new google.auth.GoogleAuth({
      keyFile: credentialsPath,
      scopes: ['https://www.googleapis.com/auth/spreadsheets.readonly'],
    });
    const sheets = google.sheets({ version: 'v4', auth });

    const response = await sheets.spreadsheets.values.get(
      { spreadsheetId: sheetId, range: worksheetName },
      { timeout: timeoutMs },
    );
    return toRowBatch(response.data.values ?? []);
  }
}
