export type LogLevel = 'debug' | 'info' | 'warn' | 'error';


const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };


function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}


function serializeError(error: Error) {
    return { name: error.name, message: error.message, stack: error.stack };
}


export function safeSerialize(meta: unknown): unknown {
    try {
        if (meta instanceof Error) {
            return serializeError(meta);
        }
        const json = JSON.stringify(meta, (_k, v: unknown) => {
            if (v instanceof Set) return Array.from(v);
            if (v instanceof Map) return Object.fromEntries(v);
            if (typeof v === 'bigint') return v.toString();
            if (v instanceof Error) return serializeError(v);
            return v;
        });
        return json === undefined ? String(meta) : JSON.parse(json);
    } catch {
        return { value: String(meta) };
    }
}


export class Logger {
    constructor(
        private level: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info',
        private name = 'field-scraper'
    ) { }


    private should(level: LogLevel) {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }


    private line(level: LogLevel, msg: string, meta?: unknown) {
        const payload: Record<string, unknown> = {
            ts: new Date().toISOString(),
            level,
            name: this.name,
            msg,
        };
        if (meta !== undefined) payload.meta = safeSerialize(meta);
        return JSON.stringify(payload);
    }


    debug(msg: string, meta?: unknown) {
        if (this.should('debug')) console.debug(this.line('debug', msg, meta));
    }
    info(msg: string, meta?: unknown) {
        if (this.should('info')) console.log(this.line('info', msg, meta));
    }
    warn(msg: string, meta?: unknown) {
        if (this.should('warn')) console.warn(this.line('warn', msg, meta));
    }
    error(msg: string, meta?: unknown) {
        if (this.should('error')) console.error(this.line('error', msg, meta));
    }


    child(bindings: Partial<{ name: string; level: LogLevel }>) {
        return new Logger(bindings.level ?? this.level, bindings.name ?? this.name);
    }
}


const logger = new Logger();

export default logger;
