export interface SweepTask {
	name: string;
	run(): Promise<unknown>;
}

/**
 * Runs background sweeps on a fixed interval. A tick that fires while the
 * previous one is still running is skipped.
 */
export class SweepScheduler {
	private timer: NodeJS.Timeout | null = null;
	private running: Promise<void> | null = null;

	constructor(private readonly tasks: SweepTask[], private readonly intervalMs: number) {}

	start(): void {
		if (this.timer) {
			throw new Error("Sweep scheduler already started");
		}
		this.timer = setInterval(() => {
			void this.tick();
		}, this.intervalMs);
		this.timer.unref?.();
	}

	async stop(): Promise<void> {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
		await this.running;
	}

	/** Runs every task once. Returns false when a previous run is still in progress. */
	async tick(): Promise<boolean> {
		if (this.running) {
			console.debug("[scheduler] previous sweep still running, skipping tick");
			return false;
		}
		const run = this.runAll();
		this.running = run;
		try {
			await run;
		} finally {
			this.running = null;
		}
		return true;
	}

	private async runAll(): Promise<void> {
		for (const task of this.tasks) {
			try {
				const result = await task.run();
				console.info(`[scheduler] ${task.name} finished`, result);
			} catch (error) {
				console.error(`[scheduler] ${task.name} failed`, error);
			}
		}
	}
}
