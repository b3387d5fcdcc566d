/**
 * Unit Tests: Event Hooks
 *
 * Purpose: listener registration and isolation of failing listeners.
 */
import { afterEach, describe, expect, it, vi } from "vitest";
import { createEventHook } from "@/events/hooks/createEventHook";

describe("createEventHook", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("calls listeners until they are removed", async () => {
		const [on, , , emit] = createEventHook<[string]>("test").make();
		const seen: string[] = [];
		const unsubscribe = on((value) => {
			seen.push(value);
		});

		await emit("first");
		unsubscribe();
		await emit("second");

		expect(seen).toEqual(["first"]);
	});

	it("runs once listeners a single time", async () => {
		const [, once, , emit] = createEventHook<[number]>("test").make();
		const listener = vi.fn();
		once(listener);

		await emit(1);
		await emit(2);

		expect(listener).toHaveBeenCalledTimes(1);
		expect(listener).toHaveBeenCalledWith(1);
	});

	it("keeps going when a listener throws", async () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		const [on, , , emit] = createEventHook<[]>("test").make();
		const after = vi.fn();
		on(() => {
			throw new Error("boom");
		});
		on(after);

		await emit();

		expect(after).toHaveBeenCalledTimes(1);
		expect(error).toHaveBeenCalledWith("[test] Listener failed:", expect.any(Error));
	});
});
