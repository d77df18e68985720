import chalk from 'chalk';

export interface TableColumn {
  header: string;
  width: number;
}

export function printSuccess(message: string): void {
  console.log(chalk.green(message));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(message));
}

export function printFailure(message: string): void {
  console.error(chalk.red(message));
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Fixed-width table. Cells longer than their column are cut to fit;
 * the last column is never cut.
 */
export function printTable(columns: TableColumn[], rows: string[][]): void {
  const totalWidth = columns.reduce((sum, column) => sum + column.width, 0);
  const formatRow = (cells: string[]): string =>
    columns
      .map((column, i) => {
        const cell = cells[i] ?? '';
        if (i === columns.length - 1) return cell;
        return cell.slice(0, column.width - 2).padEnd(column.width);
      })
      .join('');

  console.log('-'.repeat(totalWidth));
  console.log(formatRow(columns.map((column) => column.header)));
  console.log('-'.repeat(totalWidth));
  for (const row of rows) {
    console.log(formatRow(row));
  }
  console.log('-'.repeat(totalWidth));
}
