/**
 * Removes, in place and in a single pass, every element whose index is in `remove`.
 * Survivors keep their relative order. Returns the number of removed elements.
 */
export const compactInPlace = <T>(items: T[], remove: ReadonlySet<number>): number => {
    if (remove.size === 0) return 0;

    let write = 0;
    for (let read = 0; read < items.length; read++) {
        if (remove.has(read)) continue;
        if (write !== read) {
            items[write] = items[read];
        }
        write++;
    }
    const removed = items.length - write;
    items.length = write;
    return removed;
};

// Hosts may hand over a stalled, negative or garbage frame time
export const sanitizeDeltaTime = (deltaTime: number): number =>
    Number.isFinite(deltaTime) && deltaTime > 0 ? deltaTime : 0;
