import { env } from '../config/env';

/**
 * Daily admission window for new report uploads, in server local time.
 * Open from `startHour:00` up to and including `endHour:00`.
 */
export class UploadWindow {
    constructor(private readonly startHour: number, private readonly endHour: number) {
        if (startHour >= endHour) {
            throw new Error(`Invalid upload window ${startHour}-${endHour}`);
        }
    }

    isWithinWindow(now: Date = new Date()): boolean {
        const hour = now.getHours();
        if (hour >= this.startHour && hour < this.endHour) return true;
        return hour === this.endHour && now.getMinutes() === 0;
    }

    describe(): string {
        const pad = (h: number) => `${String(h).padStart(2, '0')}:00`;
        return `${pad(this.startHour)} - ${pad(this.endHour)}`;
    }
}

export const uploadWindow = new UploadWindow(env.UPLOAD_WINDOW_START_HOUR, env.UPLOAD_WINDOW_END_HOUR);
