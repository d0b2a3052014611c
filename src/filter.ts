// src/filter.ts
// Directive filter: comma-separated `target=level` rules.
// - Case-insensitive level keywords; 'off' silences a target.
// - Last declared directive whose target is a prefix of the record's target decides.
// - Bad pieces are dropped, never thrown.

import { LogLevel } from './types';
import type { FilterMode, Level, LogRecord } from './types';
import { parseLevel } from './level';

/* ---------------------------------- Types ---------------------------------- */

/**
 * One filter rule. Without `name` it applies to every target.
 */
export interface Directive {
    readonly name?: string;
    readonly level: LogLevel;
}

export interface ParsedSpec {
    readonly directives: readonly Directive[];
    /** Pieces of the spec that were dropped, as written. */
    readonly rejected: readonly string[];
}

/** Threshold used when no directive applies. */
export const DEFAULT_LEVEL = LogLevel.INFO;

/* --------------------------------- Parsing --------------------------------- */

function parseDirective(piece: string): Directive | undefined {
    const parts = piece.split('=');
    if (parts.length > 2) return undefined;

    const [name, rawLevel] = parts;
    if (parts.length === 1) {
        // bare keyword sets the global level; anything else names a target at every level
        const level = parseLevel(name);
        return level !== undefined ? { level } : { name, level: LogLevel.TRACE };
    }

    const target = name.trim();
    if (!target) return undefined;
    if (!rawLevel.trim()) return { name: target, level: LogLevel.TRACE };

    const level = parseLevel(rawLevel);
    return level !== undefined ? { name: target, level } : undefined;
}

/**
 * Parse `target1=level1,target2=level2,...`; a bare level sets the global default.
 */
export function parseSpec(spec: string): ParsedSpec {
    const directives: Directive[] = [];
    const rejected: string[] = [];

    for (const raw of spec.split(',')) {
        const piece = raw.trim();
        if (!piece) continue;
        const directive = parseDirective(piece);
        if (directive) directives.push(directive);
        else rejected.push(piece);
    }

    return { directives, rejected };
}

/* --------------------------------- Engine ---------------------------------- */

/**
 * Immutable pass/fail oracle built from a spec string.
 * In 'level' mode the spec collapses to its last global level and only that is consulted.
 */
export class FilterEngine {
    readonly mode: FilterMode;
    readonly directives: readonly Directive[];
    private readonly maxLevel: LogLevel;
    private readonly globalLevel: LogLevel;

    private constructor(mode: FilterMode, parsed: ParsedSpec) {
        this.mode = mode;

        let global: LogLevel | undefined;
        for (const d of parsed.directives) {
            if (d.name === undefined) global = d.level;
        }
        this.globalLevel = global ?? DEFAULT_LEVEL;

        if (mode === 'level') {
            this.directives = [{ level: this.globalLevel }];
            this.maxLevel = this.globalLevel;
            return;
        }

        this.directives = Object.freeze([...parsed.directives]);

        let max: LogLevel = global === undefined ? DEFAULT_LEVEL : LogLevel.OFF;
        for (const d of this.directives) {
            if (d.level > max) max = d.level;
        }
        this.maxLevel = max;
    }

    static build(spec: string, mode: FilterMode = 'directives'): FilterEngine {
        return new FilterEngine(mode, parseSpec(spec));
    }

    /** Most verbose level any target could pass; a cheap gate before building a record. */
    effectiveMaxLevel(): LogLevel {
        return this.maxLevel;
    }

    enabled(target: string, level: Level): boolean {
        if (this.mode === 'level') return level <= this.globalLevel;

        for (let i = this.directives.length - 1; i >= 0; i--) {
            const d = this.directives[i];
            if (d.name === undefined || target.startsWith(d.name)) {
                return level <= d.level;
            }
        }
        return level <= DEFAULT_LEVEL;
    }

    matches(record: LogRecord): boolean {
        return this.enabled(record.target, record.level);
    }
}
