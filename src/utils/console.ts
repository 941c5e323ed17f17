import chalk from "chalk";
import { appendFileSync } from "node:fs";

let logFilePath: string | null = null;

function isTestEnv(): boolean {
  return process.env.NODE_ENV === "test" || process.env.JEST_WORKER_ID !== undefined;
}

function consoleLogExceptInTestEnv(message: string): void {
  if (!isTestEnv()) {
    console.log(message);
  }
}

export function setLogFile(filePath: string | null): void {
  logFilePath = filePath;
}

export function formatLogLine(level: string, message: string, when: Date = new Date()): string {
  return `[${when.toISOString()}] [${level}] ${message}\n`;
}

function writeToLog(level: string, message: string): void {
  if (!logFilePath) {
    return;
  }
  appendFileSync(logFilePath, formatLogLine(level, message), "utf-8");
}

export function success(message: string): void {
  consoleLogExceptInTestEnv(chalk.green(message));
  writeToLog("SUCCESS", message);
}

export function error(message: string): void {
  consoleLogExceptInTestEnv(chalk.red(message));
  writeToLog("ERROR", message);
}

export function warning(message: string): void {
  consoleLogExceptInTestEnv(chalk.bgHex(`#FFA500`).black(`WARNING: ${message}`));
  writeToLog("WARNING", message);
}

export function info(message: string): void {
  consoleLogExceptInTestEnv(chalk.blue(message));
  writeToLog("INFO", message);
}

export function dim(message: string): void {
  consoleLogExceptInTestEnv(chalk.gray(message));
  writeToLog("DEBUG", message);
}
