import { formatDateToLocalDateString } from '../utils/date';

export interface Clock {
    now(): Date;
}

export const systemClock: Clock = {
    now: () => new Date()
};

/**
 * Calendar day ("YYYY-MM-DD") that daily logs are keyed by.
 */
export class CalendarDay {
    constructor(
        private readonly clock: Clock,
        readonly timeZone: string
    ) {}

    now(): Date {
        return this.clock.now();
    }

    today(): string {
        return formatDateToLocalDateString(this.clock.now(), this.timeZone);
    }
}
