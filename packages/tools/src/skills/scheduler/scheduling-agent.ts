import type { EventRecord, EventStore } from '@tessera/db'
import { TimeParseError } from '@tessera/shared'
import { formatLocalTimestamp, parseNaturalTime } from './time-parser'

/** Scheduler over an EventStore; turns natural-language times into stored timestamps. */
export class SchedulingAgent {
    constructor(
        private readonly store: EventStore,
        private readonly clock: () => Date = () => new Date(),
    ) {}

    async addEvent(title: string, when: string, now: Date = this.clock()): Promise<number> {
        const whenDate = parseNaturalTime(when, now)
        if (!whenDate) throw new TimeParseError(when)

        const id = await this.store.insert(title, formatLocalTimestamp(whenDate))
        console.log(`[scheduler] Added event ${id}: "${title}" at ${formatLocalTimestamp(whenDate)}`)
        return id
    }

    listEvents(): Promise<EventRecord[]> {
        return this.store.list()
    }

    removeEvent(id: number): Promise<boolean> {
        return this.store.remove(id)
    }
}
