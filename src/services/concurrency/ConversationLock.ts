/**
 * Per-user conversation lock: only one in-flight operation per user at a time.
 * A second operation for the same user is rejected immediately with "busy";
 * different users are not blocked.
 */

export type RunExclusiveResult<T> =
	| { status: "accepted"; result: T }
	| { status: "rejected"; reason: "busy" };

export class ConversationLock {
	private readonly busyUsers = new Set<string>();

	isBusy(userId: string): boolean {
		return this.busyUsers.has(userId);
	}

	/**
	 * Lock is always released in finally, including on thrown errors.
	 */
	async runExclusive<T>(userId: string, fn: () => Promise<T>): Promise<RunExclusiveResult<T>> {
		if (this.busyUsers.has(userId)) {
			return { status: "rejected", reason: "busy" };
		}
		this.busyUsers.add(userId);
		try {
			const result = await fn();
			return { status: "accepted", result };
		} finally {
			this.busyUsers.delete(userId);
		}
	}
}

const sharedLock = new ConversationLock();

export function runExclusive<T>(userId: string, fn: () => Promise<T>): Promise<RunExclusiveResult<T>> {
	return sharedLock.runExclusive(userId, fn);
}
