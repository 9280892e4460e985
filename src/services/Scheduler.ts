import { Logger, silentLogger } from '#utils/Logger';
import { formatError } from '#models/Errors';

export type Task = () => void;

export interface TimerHandle {
    readonly id: number;
}

interface Entry extends TimerHandle {
    due: number;
    task: Task;
}

/**
 * Single serialization point of the engine. Inbound frames and timer expiries
 * are queued and run one at a time, each to completion; a throwing task is
 * logged and the queue moves on.
 */
class Scheduler {
    private queue: Task[] = [];
    private heap: Entry[] = [];
    private live = new Set<number>();
    private draining = false;
    private stopped = false;
    private nextId = 0;
    private timer?: NodeJS.Timeout;
    private logger: Logger;

    constructor(logger: Logger = silentLogger) {
        this.logger = logger.child({ component: 'scheduler' });
    }

    post(task: Task): void {
        if (this.stopped) return;
        this.queue.push(task);
        this.drain();
    }

    schedule(delay: number, task: Task): TimerHandle {
        const entry: Entry = { id: ++this.nextId, due: Date.now() + Math.max(0, delay), task };
        if (this.stopped) return entry;

        this.live.add(entry.id);
        this.push(entry);
        this.arm();
        return entry;
    }

    cancel(handle: TimerHandle | undefined): void {
        if (handle) this.live.delete(handle.id);
    }

    /** Number of timers still waiting to fire. */
    pending(): number {
        return this.live.size;
    }

    stop(): void {
        this.stopped = true;
        this.queue = [];
        this.heap = [];
        this.live.clear();
        if (this.timer) clearTimeout(this.timer);
        this.timer = undefined;
    }

    private drain() {
        if (this.draining) return;
        this.draining = true;
        try {
            for (let task = this.queue.shift(); task; task = this.queue.shift()) {
                try {
                    task();
                } catch (err) {
                    this.logger.error({ err: formatError(err) }, 'task failed');
                }
            }
        } finally {
            this.draining = false;
        }
    }

    private arm() {
        if (this.timer) clearTimeout(this.timer);
        this.timer = undefined;

        while (this.heap.length && !this.live.has(this.heap[0].id)) this.pop();
        if (!this.heap.length) return;

        this.timer = setTimeout(() => this.fire(), Math.max(0, this.heap[0].due - Date.now()));
        this.timer.unref();
    }

    private fire() {
        this.timer = undefined;
        const now = Date.now();

        while (this.heap.length && this.heap[0].due <= now) {
            const entry = this.pop();
            if (entry && this.live.delete(entry.id)) this.queue.push(entry.task);
        }

        this.drain();
        if (!this.stopped) this.arm();
    }

    private push(entry: Entry) {
        const heap = this.heap;
        heap.push(entry);
        let i = heap.length - 1;
        while (i > 0) {
            const parent = (i - 1) >> 1;
            if (this.before(heap[parent], heap[i])) break;
            [heap[parent], heap[i]] = [heap[i], heap[parent]];
            i = parent;
        }
    }

    private pop(): Entry | undefined {
        const heap = this.heap;
        const top = heap[0];
        const last = heap.pop();
        if (heap.length && last) {
            heap[0] = last;
            let i = 0;
            for (;;) {
                const l = 2 * i + 1;
                const r = l + 1;
                let m = i;
                if (l < heap.length && this.before(heap[l], heap[m])) m = l;
                if (r < heap.length && this.before(heap[r], heap[m])) m = r;
                if (m === i) break;
                [heap[m], heap[i]] = [heap[i], heap[m]];
                i = m;
            }
        }
        return top;
    }

    /** Earlier deadline first; equal deadlines fire in scheduling order. */
    private before(a: Entry, b: Entry): boolean {
        return a.due < b.due || (a.due === b.due && a.id < b.id);
    }
}

export default Scheduler;
