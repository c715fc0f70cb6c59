import Table from 'cli-table3';

export type TableRow = Record<string, string | number>;

export function printTable(rows: TableRow[], options?: Table.TableConstructorOptions) {
  if (rows.length === 0) return;
  const head = options?.head ?? Object.keys(rows[0]);
  const table = new Table({ head, ...options });
  rows.forEach((row) => table.push(Object.values(row).map((v) => String(v))));
  console.log(table.toString());
}
