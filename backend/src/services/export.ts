import { promises as fs } from "fs";
import path from "path";
import Papa from "papaparse";
import { CentralityRow } from "../types/passing";

export const CSV_COLUMNS = ["player", "degree", "betweenness", "closeness", "team"] as const;

export const toCsv = (table: readonly CentralityRow[]): string =>
  Papa.unparse(
    {
      fields: [...CSV_COLUMNS],
      data: table.map((row) => CSV_COLUMNS.map((column) => row[column])),
    },
    { newline: "\n" }
  );

export async function exportCentralityCsv(
  table: readonly CentralityRow[],
  filePath: string
): Promise<string> {
  const target = path.resolve(filePath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, `${toCsv(table)}\n`, "utf8");
  return target;
}
