import { google, type sheets_v4 } from 'googleapis';
import { logger } from '../infra/logger.js';

/**
 * Minimal tabbed row store the remote sink writes through
 */
export interface RowStore {
    /** Create the tab when it does not exist */
    ensureTab(tab: string): Promise<void>;
    /** Values of the first row, empty when the tab is blank */
    readHeader(tab: string): Promise<string[]>;
    appendRow(tab: string, row: readonly string[]): Promise<void>;
}

export interface GoogleSheetsStoreOptions {
    spreadsheetId: string;
    credentialsFile: string;
    timeoutMs: number;
}

function a1Tab(tab: string): string {
    return `'${tab.replace(/'/g, "''")}'`;
}

/**
 * Google Sheets through the v4 API, authenticated with a service-account key file
 */
export class GoogleSheetsStore implements RowStore {
    private readonly sheets: sheets_v4.Sheets;
    private readonly spreadsheetId: string;
    private readonly timeoutMs: number;

    constructor(options: GoogleSheetsStoreOptions) {
        const auth = new google.auth.GoogleAuth({
            keyFile: options.credentialsFile,
            scopes: ['https://www.googleapis.com/auth/spreadsheets'],
        });
        this.sheets = google.sheets({ version: 'v4', auth });
        this.spreadsheetId = options.spreadsheetId;
        this.timeoutMs = options.timeoutMs;
    }

    async ensureTab(tab: string): Promise<void> {
        const { data } = await this.sheets.spreadsheets.get(
            { spreadsheetId: this.spreadsheetId, fields: 'sheets.properties.title' },
            { timeout: this.timeoutMs }
        );
        const exists = (data.sheets ?? []).some(sheet => sheet.properties?.title === tab);
        if (exists) {
            return;
        }

        await this.sheets.spreadsheets.batchUpdate(
            {
                spreadsheetId: this.spreadsheetId,
                requestBody: { requests: [{ addSheet: { properties: { title: tab } } }] },
            },
            { timeout: this.timeoutMs }
        );
        logger.info('sheets.tab.created', { spreadsheetId: this.spreadsheetId, tab });
    }

    async readHeader(tab: string): Promise<string[]> {
        const { data } = await this.sheets.spreadsheets.values.get(
            { spreadsheetId: this.spreadsheetId, range: `${a1Tab(tab)}!1:1` },
            { timeout: this.timeoutMs }
        );
        const firstRow: unknown[] = data.values?.[0] ?? [];
        return firstRow.map(value => String(value));
    }

    async appendRow(tab: string, row: readonly string[]): Promise<void> {
        await this.sheets.spreadsheets.values.append(
            {
                spreadsheetId: this.spreadsheetId,
                range: `${a1Tab(tab)}!A1`,
                // Numbers and timestamps land as values the dashboard formulas can aggregate
                valueInputOption: 'USER_ENTERED',
                insertDataOption: 'INSERT_ROWS',
                requestBody: { values: [[...row]] },
            },
            { timeout: this.timeoutMs }
        );
    }
}
