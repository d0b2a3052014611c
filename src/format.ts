import { LogLevel } from './types';
import type { ColorMode, Level } from './types';
import { levelName } from './level';

/* ---------------------------------- Types ---------------------------------- */

/** Renders `[{timestamp} {LEVEL} {target}] {message}`. */
export type LineFormatter = (level: Level, target: string, message: string) => string;

const CSI = '\x1b[';
const colors = {
    red:    (s: string) => `${CSI}31m${s}${CSI}39m`,
    yellow: (s: string) => `${CSI}33m${s}${CSI}39m`,
    cyan:   (s: string) => `${CSI}36m${s}${CSI}39m`,
    gray:   (s: string) => `${CSI}90m${s}${CSI}39m`,
    dim:    (s: string) => `${CSI}2m${s}${CSI}22m`,
};

/* ------------------------------- Formatters -------------------------------- */

export function isoClock(): string {
    return new Date().toISOString();
}

/** What `auto` reads from the host; hosts without `process` have none of it. */
interface HostGlobals {
    process?: {
        env?: Readonly<Record<string, string | undefined>>;
        stdout?: { isTTY?: boolean };
    };
}

/** `on` always, `auto` on a TTY outside production. */
export function shouldColor(color: ColorMode, env?: Readonly<Record<string, string | undefined>>): boolean {
    if (color !== 'auto') return color === 'on';
    const gt: HostGlobals = globalThis;
    const nodeEnv = (env ?? gt.process?.env)?.NODE_ENV;
    const isTTY = !!gt.process?.stdout?.isTTY;
    return isTTY && nodeEnv !== 'production';
}

function paintLevel(level: Level): string {
    const name = levelName(level);
    switch (level) {
        case LogLevel.ERROR: return colors.red(name);
        case LogLevel.WARN:  return colors.yellow(name);
        case LogLevel.INFO:  return colors.dim(name);
        case LogLevel.DEBUG: return colors.cyan(name);
        case LogLevel.TRACE: return colors.gray(name);
    }
}

/** Line formatter; styling touches the level token only. */
export function createLineFormatter(useColor: boolean, clock: () => string = isoClock): LineFormatter {
    const token = useColor ? paintLevel : levelName;
    return (level, target, message) => `[${clock()} ${token(level)} ${target}] ${message}`;
}

/* ----------------------------- Format helpers ------------------------------ */

/** `file:line` when the record knows both, its target otherwise. */
export function resolveTarget(record: { target: string; file?: string; line?: number }): string {
    return record.file !== undefined && record.line !== undefined
        ? `${record.file}:${record.line}`
        : record.target;
}
