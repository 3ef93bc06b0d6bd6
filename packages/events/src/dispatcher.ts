/**
 * Event Dispatcher
 *
 * Named events with async handlers. Handlers run one after another in
 * registration order and their results are collected for the emitter.
 */

export type EventPayload = Readonly<Record<string, unknown>> | undefined;

export type EventHandler = (data: EventPayload) => unknown;

export interface ListenerOptions {
	/** Remove the handler after its first invocation */
	once?: boolean;
}

interface Listener {
	readonly handler: EventHandler;
	readonly once: boolean;
}

export class EventDispatcher {
	private readonly listeners = new Map<string, Listener[]>();

	/**
	 * Register a handler for an event.
	 */
	on(event: string, handler: EventHandler, options: ListenerOptions = {}): void {
		const registered = this.listeners.get(event) ?? [];
		registered.push({ handler, once: options.once ?? false });
		this.listeners.set(event, registered);
	}

	/**
	 * Register a handler that runs at most once.
	 */
	once(event: string, handler: EventHandler): void {
		this.on(event, handler, { once: true });
	}

	/**
	 * Remove the earliest registration of a handler.
	 * Returns false when the handler was not registered for the event.
	 */
	off(event: string, handler: EventHandler): boolean {
		const registered = this.listeners.get(event);
		const listener = registered?.find((entry) => entry.handler === handler);
		return listener ? this.remove(event, listener) : false;
	}

	/**
	 * Invoke every handler of an event and return their results in order.
	 *
	 * Handlers registered during the emit are not invoked by it. A handler
	 * that throws rejects the returned promise and later handlers do not run.
	 */
	async emit(event: string, data?: EventPayload): Promise<unknown[]> {
		const registered = this.listeners.get(event);
		if (!registered) {
			return [];
		}

		const results: unknown[] = [];
		for (const listener of [...registered]) {
			// Skips listeners removed by an earlier handler or consumed by an overlapping emit
			const current = this.listeners.get(event);
			if (!current?.includes(listener)) {
				continue;
			}
			if (listener.once) {
				this.remove(event, listener);
			}
			results.push(await listener.handler(data));
		}
		return results;
	}

	listenerCount(event: string): number {
		return this.listeners.get(event)?.length ?? 0;
	}

	private remove(event: string, listener: Listener): boolean {
		const registered = this.listeners.get(event);
		if (!registered) {
			return false;
		}

		const index = registered.indexOf(listener);
		if (index < 0) {
			return false;
		}

		registered.splice(index, 1);
		if (registered.length === 0) {
			this.listeners.delete(event);
		}
		return true;
	}
}
