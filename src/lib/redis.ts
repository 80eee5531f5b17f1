import Redis from "ioredis";

/**
 * Connection for BullMQ queues and workers.
 * BullMQ requires `maxRetriesPerRequest: null` on blocking connections.
 */
export function createRedisConnection(url: string): Redis {
    const client = new Redis(url, {
        maxRetriesPerRequest: null,
        retryStrategy(times) {
            const delay = Math.min(times * 50, 2000);
            return delay;
        },
    });

    client.on("error", (err) => {
        console.error("[Redis] Connection error:", err.message);
    });

    client.on("connect", () => {
        console.log("[Redis] Connected successfully");
    });

    return client;
}
