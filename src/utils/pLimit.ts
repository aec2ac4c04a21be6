/**
 * Tiny p-limit: runs at most `concurrency` tasks at once, in submission order.
 */
export function pLimit(concurrency: number) {
    const queue: Array<() => void> = [];
    let active = 0;

    const next = () => {
        active--;
        const start = queue.shift();
        if (start) start();
    };

    return <T>(fn: () => Promise<T>) => new Promise<T>((resolve, reject) => {
        const start = () => {
            active++;
            void Promise.resolve().then(fn).then(resolve, reject).finally(next);
        };
        if (active < concurrency) start();
        else queue.push(start);
    });
}
