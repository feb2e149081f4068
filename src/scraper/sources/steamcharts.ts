import * as cheerio from "cheerio";

import { SourceError } from "../../errors.js";
import {
  nonEmpty,
  parseMonthPeriod,
  parseNumber,
  parsePercent,
} from "../normalize.js";

import type { SourceAdapter, SourceRequest } from "../client.js";
import type { PlayerMonthRecord } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

/**
 * One table row, cells keyed by the column they were found under.
 */
export interface ChartRow {
  month: string;
  avgPlayers: string | null;
  gain: string | null;
  gainPct: string | null;
  peakPlayers: string | null;
}

type ColumnName = keyof ChartRow;

const HEADER_COLUMNS: Record<string, ColumnName> = {
  month: "month",
  "avg. players": "avgPlayers",
  "avg players": "avgPlayers",
  gain: "gain",
  "% gain": "gainPct",
  "peak players": "peakPlayers",
};

export const STEAMCHARTS_ENDPOINT = "app";

// ============================================================================
// HTML
// ============================================================================

function headerKey(text: string): string {
  return text.replace(/\s+/g, " ").trim().toLowerCase();
}

/**
 * Read the monthly table of an app page. Columns are located by header
 * text, not position, so a reordered table still parses.
 */
export function parseChartTable(html: string, appid: number): ChartRow[] {
  const $ = cheerio.load(html);
  const table = $("table.common-table").first();
  if (table.length === 0) {
    throw new SourceError(
      "malformed",
      `No monthly table on SteamCharts page for ${String(appid)}`
    );
  }

  const headers = table
    .find("thead th")
    .toArray()
    .map((cell) => headerKey($(cell).text()));
  const columns = new Map<ColumnName, number>();
  headers.forEach((header, index) => {
    const column = HEADER_COLUMNS[header];
    if (column !== undefined && !columns.has(column)) {
      columns.set(column, index);
    }
  });

  const monthIndex = columns.get("month");
  if (monthIndex === undefined || !columns.has("avgPlayers")) {
    throw new SourceError(
      "malformed",
      `SteamCharts table for ${String(appid)} has unexpected headers: ${headers.join(" | ")}`
    );
  }

  const cellAt = (cells: string[], column: ColumnName): string | null => {
    const index = columns.get(column);
    return index !== undefined ? nonEmpty(cells[index]) : null;
  };

  const rows: ChartRow[] = [];
  for (const row of table.find("tbody tr").toArray()) {
    const cells = $(row)
      .find("td")
      .toArray()
      .map((cell) => $(cell).text().trim());
    const month = nonEmpty(cells[monthIndex]);
    if (month === null) {
      continue;
    }
    rows.push({
      month,
      avgPlayers: cellAt(cells, "avgPlayers"),
      gain: cellAt(cells, "gain"),
      gainPct: cellAt(cells, "gainPct"),
      peakPlayers: cellAt(cells, "peakPlayers"),
    });
  }
  return rows;
}

function roundOrNull(value: number | null): number | null {
  return value === null ? null : Math.round(value);
}

// ============================================================================
// Adapter
// ============================================================================

export class SteamChartsAdapter
  implements SourceAdapter<ChartRow[], PlayerMonthRecord>
{
  readonly source = "timeseries" as const;
  readonly provider = "steamcharts";
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  requestFor(appid: number): SourceRequest {
    return {
      endpoint: STEAMCHARTS_ENDPOINT,
      url: `${this.baseUrl}/app/${String(appid)}`,
      format: "text",
    };
  }

  parse(raw: unknown, appid: number): ChartRow[] {
    if (typeof raw !== "string") {
      throw new SourceError(
        "malformed",
        `Expected HTML for SteamCharts app ${String(appid)}`
      );
    }
    return parseChartTable(raw, appid);
  }

  normalize(rows: ChartRow[], appid: number): PlayerMonthRecord[] {
    const records: PlayerMonthRecord[] = [];
    for (const row of rows) {
      // "Last 30 Days" and other rolling rows have no calendar month
      const period = parseMonthPeriod(row.month);
      if (period === null) {
        continue;
      }
      records.push({
        appid,
        period,
        avgPlayers: roundOrNull(parseNumber(row.avgPlayers)),
        peakPlayers: roundOrNull(parseNumber(row.peakPlayers)),
        gain: parseNumber(row.gain),
        gainPct: parsePercent(row.gainPct),
      });
    }
    return records;
  }
}
