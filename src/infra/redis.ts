import { createClient } from "redis";

export type RedisClient = ReturnType<typeof createClient>;

export interface RedisConnectionOptions {
	url: string;
	connectTimeoutMs: number;
}

const MAX_RECONNECT_DELAY_MS = 5_000;

class RedisManager {
	private static instance: RedisManager | null = null;

	static shared(): RedisManager {
		if (!RedisManager.instance) {
			RedisManager.instance = new RedisManager();
		}
		return RedisManager.instance;
	}

	private client: RedisClient | null = null;
	private url: string | null = null;
	private referenceCount = 0;

	private constructor() {}

	async acquire(options: RedisConnectionOptions): Promise<RedisClient> {
		if (!this.client) {
			this.client = await this.connect(options);
			this.url = options.url;
		} else if (this.url && this.url !== options.url) {
			throw new Error(`RedisManager already initialised with URL ${this.url} but received ${options.url}`);
		} else if (!this.client.isOpen) {
			await this.client.connect();
		}

		this.referenceCount += 1;
		return this.client;
	}

	async release(): Promise<void> {
		if (!this.client) {
			return;
		}
		this.referenceCount = Math.max(this.referenceCount - 1, 0);
		if (this.referenceCount > 0) {
			return;
		}
		try {
			await this.client.quit();
		} finally {
			this.client = null;
			this.url = null;
		}
	}

	private async connect(options: RedisConnectionOptions): Promise<RedisClient> {
		const client = createClient({
			url: options.url,
			socket: {
				connectTimeout: options.connectTimeoutMs,
				reconnectStrategy: (retries) => Math.min(retries * 100, MAX_RECONNECT_DELAY_MS),
			},
		});
		client.on("error", (error) => {
			console.error("[redis] connection error", error);
		});
		client.on("reconnecting", () => {
			console.warn("[redis] reconnecting", { url: options.url });
		});
		await client.connect();
		return client;
	}
}

export async function acquireRedisClient(options: RedisConnectionOptions): Promise<RedisClient> {
	return RedisManager.shared().acquire(options);
}

export async function releaseRedisClient(): Promise<void> {
	await RedisManager.shared().release();
}
