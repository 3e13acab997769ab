import 'dotenv/config';
import { resolve } from 'path';

type Env = Record<string, string | undefined>;

export function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

// Plain decimal digits only; hex, binary and exponent forms are rejected
export function parsePort(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  const n = Number(value);
  return n >= 1 && n <= 65535 ? n : null;
}

export function findEnvProblems(env: Env = process.env): string[] {
  const problems: string[] = [];
  const port = env.PORT;
  if (port !== undefined && port !== '' && parsePort(port) === null) {
    problems.push(`PORT must be an integer between 1 and 65535, got "${port}"`);
  }
  return problems;
}

export function validateEnv(): void {
  const problems = findEnvProblems();
  if (problems.length > 0) {
    for (const p of problems) console.error(`Invalid environment: ${p}`);
    console.error('Fix your .env file. See .env.example');
    process.exit(1);
  }
}

export const config = {
  get PORT() { return parsePort(process.env.PORT) ?? 8000; },
  get HOST() { return process.env.HOST || '0.0.0.0'; },
  get STATIC_DIR() { return resolve(process.cwd(), process.env.STATIC_DIR || 'static'); },
  get ENFORCE_CAPACITY() { return parseFlag(process.env.ENFORCE_CAPACITY, true); },
  get LOG_ENABLED() { return (process.env.LOG_LEVEL || 'info').toLowerCase() !== 'silent'; },
};
