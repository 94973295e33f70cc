import fs from "node:fs";
import path from "node:path";
import { ConfigError, ExportError } from "../sim/errors";
import { parseEventsFile, type EventsFile } from "../sim/config";
import { toCsv, type CsvValue } from "../sim/exports";

export function readEventsFile(filePath: string): EventsFile {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`cannot read config ${filePath}`, { cause: err });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`config ${filePath} is not valid JSON`, { cause: err });
  }
  return parseEventsFile(raw);
}

export function ensureDir(p: string): void {
  fs.mkdirSync(p, { recursive: true });
}

export function writeCsvFile<K extends string>(
  filePath: string,
  headers: readonly K[],
  rows: ReadonlyArray<Readonly<Record<K, CsvValue>>>
): void {
  try {
    ensureDir(path.dirname(filePath));
    fs.writeFileSync(filePath, toCsv(headers, rows), "utf-8");
  } catch (err) {
    throw new ExportError(`cannot write ${filePath}`, filePath, { cause: err });
  }
}

export function writeJsonFile(filePath: string, value: unknown): void {
  try {
    ensureDir(path.dirname(filePath));
    fs.writeFileSync(filePath, JSON.stringify(value, null, 2), "utf-8");
  } catch (err) {
    throw new ExportError(`cannot write ${filePath}`, filePath, { cause: err });
  }
}
