/**
 * Bulletin results page fixtures
 */

export interface PageRow {
  code: number;
  name: string;
  year?: number;
}

/**
 * Build a results page the way the Bulletin lays it out: one row per
 * meteorite, the name linked to its code, the year in its own cell.
 */
export function resultsPage(rows: PageRow[]): string {
  const body = rows
    .map(
      (row) =>
        `<tr><td><a href="metbull.php?code=${String(row.code)}">${row.name}</a></td>` +
        `<td>Official</td><td>${row.year === undefined ? "" : String(row.year)}</td></tr>`
    )
    .join("\n");

  return `<html><body>
<table id="maintable">
<tr><th>Name</th><th>Status</th><th>Year</th></tr>
${body}
</table>
</body></html>`;
}

export const EMPTY_PAGE = resultsPage([]);

export interface TableRow {
  code: number;
  name: string;
  year: string;
  type: string;
  mass: string;
  fall?: string;
  coords?: string;
}

/**
 * Build a page in the full-table rendering. The results table sits inside a
 * layout table next to a small legend table that also mentions mass.
 */
export function fullTablePage(rows: TableRow[]): string {
  const body = rows
    .map(
      (row) =>
        `<tr><td><a href="metbull.php?code=${String(row.code)}">${row.name}</a></td>` +
        `<td>Official</td><td>${row.year}</td><td>Somewhere</td><td>${row.type}</td>` +
        `<td>${row.mass}</td><td>${row.fall ?? ""}</td><td>${row.coords ?? ""}</td></tr>`
    )
    .join("\n");

  return `<html><body>
<table class="layout"><tr><td>
<table class="legend"><tr><td>Mass is given in grams</td></tr></table>
<table class="results">
<tr><th>Name</th><th>Status</th><th>Year</th><th>Place</th><th>Type</th><th>Mass</th><th>Fall</th><th>Co-ordinates</th></tr>
${body}
</table>
</td></tr></table>
</body></html>`;
}
