/**
 * Tiny structured logger with namespaces and bound fields.
 *
 * Env:
 *  - LOG_ENABLED=0            -> disable logs (default: enabled)
 *  - LOG_LEVEL=debug|info|... -> min level (default: info)
 *  - LOG_JSON=1               -> JSON lines (default: pretty text)
 *  - LOG_SERVICE_NAME=tagger  -> service tag (optional)
 *
 * `setLogLevel` overrides LOG_LEVEL at runtime (used by --debug).
 */

export type LevelName = "trace" | "debug" | "info" | "warn" | "error";

type LevelMap = Record<LevelName, number>;

export interface LogMeta {
    [key: string]: unknown;
    error?: unknown;
    err?: unknown;
}

export interface Logger {
    trace(message: unknown, meta?: LogMeta): void;
    debug(message: unknown, meta?: LogMeta): void;
    info(message: unknown, meta?: LogMeta): void;
    warn(message: unknown, meta?: LogMeta): void;
    error(message: unknown, meta?: LogMeta): void;
    child(namespace: string | string[]): Logger;
    /** Returns a logger that merges `fields` into the meta of every entry. */
    with(fields: LogMeta): Logger;
}

const LEVELS: LevelMap = {
    trace: 10,
    debug: 20,
    info: 30,
    warn: 40,
    error: 50,
};

function isLevelName(value: string): value is LevelName {
    return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function parseLevel(value: string | undefined): number {
    const normalized = (value || "info").toLowerCase();
    return isLevelName(normalized) ? LEVELS[normalized] : LEVELS.info;
}

const ENABLED = process.env.LOG_ENABLED !== "0";
const AS_JSON = process.env.LOG_JSON === "1";
const SERVICE = process.env.LOG_SERVICE_NAME || "";
let minLevel = parseLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LevelName): void {
    minLevel = LEVELS[level];
}

function levelName(value: number): LevelName {
    const entry = (Object.entries(LEVELS) as Array<[LevelName, number]>).find(
        ([, v]) => v === value
    );
    return entry ? entry[0] : "info";
}

function serializeError(err: unknown): unknown {
    if (!err) return undefined;
    if (err instanceof Error) {
        const extra: Record<string, unknown> = { ...err };
        delete extra.message;
        delete extra.name;
        delete extra.stack;
        const cause = serializeError(err.cause);
        return {
            message: err.message,
            stack: err.stack,
            name: err.name,
            ...extra,
            ...(cause ? { cause } : {}),
        };
    }
    return err;
}

function safeStringify(obj: unknown): string {
    try {
        return JSON.stringify(obj);
    } catch {
        return '{"_":"[unserializable]"}';
    }
}

function joinNamespace(ns?: string | string[]): string {
    if (!ns) return "";
    if (Array.isArray(ns)) return ns.filter(Boolean).join(":");
    return String(ns);
}

function baseLog({ ns, fields }: { ns?: string | string[]; fields?: LogMeta }): Logger {
    const namespace = joinNamespace(ns);

    const write = (levelValue: number, msg: unknown, extra?: LogMeta) => {
        if (!ENABLED || levelValue < minLevel) return;

        const meta: LogMeta | undefined = fields || extra ? { ...fields, ...extra } : undefined;
        const now = new Date();
        const lvl = levelName(levelValue);
        const payload = {
            ts: now.toISOString(),
            level: lvl,
            ns: namespace || undefined,
            service: SERVICE || undefined,
            pid: process.pid,
            msg: String(msg ?? ""),
            ...(meta ? { meta } : {}),
        };

        if (payload.meta?.error) payload.meta.error = serializeError(payload.meta.error);
        if (payload.meta?.err) payload.meta.err = serializeError(payload.meta.err);

        let line: string;
        if (AS_JSON) {
            line = safeStringify(payload);
        } else {
            const tags = [
                `[${payload.ts}]`,
                SERVICE && `[${SERVICE}]`,
                `[${lvl.toUpperCase()}]`,
                namespace && `[${namespace}]`,
            ]
                .filter(Boolean)
                .join(" ");

            const tail = payload.meta ? ` ${safeStringify(payload.meta)}` : "";
            line = `${tags} ${payload.msg}${tail}`;
        }

        if (levelValue >= LEVELS.error) {
            console.error(line);
        } else if (levelValue >= LEVELS.warn) {
            console.warn(line);
        } else {
            console.log(line);
        }
    };

    const child = (subNs: string | string[]): Logger => {
        const next = Array.isArray(subNs) ? subNs : [String(subNs)];
        const merged = namespace ? [namespace, ...next] : next;
        return baseLog({ ns: merged, fields });
    };

    const withFields = (extra: LogMeta): Logger => baseLog({ ns, fields: { ...fields, ...extra } });

    return {
        trace: (m, meta) => write(LEVELS.trace, m, meta),
        debug: (m, meta) => write(LEVELS.debug, m, meta),
        info: (m, meta) => write(LEVELS.info, m, meta),
        warn: (m, meta) => write(LEVELS.warn, m, meta),
        error: (m, meta) => write(LEVELS.error, m, meta),
        child,
        with: withFields,
    };
}

const logger = baseLog({ ns: "" });

export default logger;
