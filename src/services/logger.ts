import { LOG_CONFIG, type LogLevel } from '../config/env';

export type Severity = 'debug' | 'info' | 'warn' | 'error';

/** One structured log record. */
export interface WideEvent {
    timestamp: number;
    type: string;
    payload: Record<string, unknown>;
    severity: Severity;
}

const SEVERITY_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

class LoggerService {
    private events: WideEvent[] = [];

    constructor(
        private level: LogLevel,
        private maxEvents: number,
    ) {}

    public log(type: string, payload: Record<string, unknown> = {}, severity: Severity = 'info') {
        const event: WideEvent = {
            timestamp: Date.now(),
            type,
            payload,
            severity,
        };

        this.events.push(event);
        if (this.events.length > this.maxEvents) {
            this.events.splice(0, this.events.length - this.maxEvents);
        }

        if (SEVERITY_RANK[severity] < SEVERITY_RANK[this.level]) return;
        if (severity === 'error') {
            console.error(`[WIDE-EVENT][${severity.toUpperCase()}] ${type}`, payload);
        } else if (severity === 'warn') {
            console.warn(`[WIDE-EVENT][${severity.toUpperCase()}] ${type}`, payload);
        } else {
            console.log(`[WIDE-EVENT][${severity.toUpperCase()}] ${type}`, payload);
        }
    }

    public debug(type: string, payload?: Record<string, unknown>) {
        this.log(type, payload, 'debug');
    }

    public info(type: string, payload?: Record<string, unknown>) {
        this.log(type, payload, 'info');
    }

    public warn(type: string, payload?: Record<string, unknown>) {
        this.log(type, payload, 'warn');
    }

    public error(type: string, payload?: Record<string, unknown>) {
        this.log(type, payload, 'error');
    }

    public setLevel(level: LogLevel) {
        this.level = level;
    }

    public setMaxEvents(maxEvents: number) {
        this.maxEvents = maxEvents;
        if (this.events.length > maxEvents) this.events.splice(0, this.events.length - maxEvents);
    }

    public getEvents() {
        return [...this.events];
    }

    public clear() {
        this.events = [];
    }
}

export const Logger = new LoggerService(LOG_CONFIG.LEVEL, LOG_CONFIG.MAX_EVENTS);
