import type { ConnectionWorker } from "../connection/worker";

/**
 * Live connections kept between batches in cumulative mode.
 * Owned by a single BatchRunner and only touched between batch phases.
 */
export class ConnectionPool {
	private readonly workers = new Set<ConnectionWorker>();

	get size(): number {
		return this.workers.size;
	}

	add(worker: ConnectionWorker): void {
		this.workers.add(worker);
	}

	/**
	 * Drop connections that closed since they joined. Returns how many were removed.
	 */
	prune(): number {
		let removed = 0;
		for (const worker of this.workers) {
			if (!worker.isOpen()) {
				this.workers.delete(worker);
				removed++;
			}
		}
		return removed;
	}

	/**
	 * Close every pooled connection and empty the pool.
	 */
	async closeAll(graceMs: number): Promise<void> {
		const workers = [...this.workers];
		this.workers.clear();
		await Promise.all(workers.map((worker) => worker.close(graceMs)));
	}
}
