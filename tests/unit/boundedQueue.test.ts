import { CancelledError } from "../../src/shared/concurrency/abort";
import { BoundedQueue, QueueClosedError } from "../../src/shared/concurrency/boundedQueue";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("BoundedQueue", () => {
  it("rejects invalid capacities", () => {
    expect(() => new BoundedQueue<number>(0)).toThrow("capacity must be an integer >= 1");
    expect(() => new BoundedQueue<number>(1.5)).toThrow("capacity must be an integer >= 1");
  });

  it("hands items out in FIFO order", async () => {
    const queue = new BoundedQueue<number>(3);
    await queue.push(1);
    await queue.push(2);
    await queue.push(3);

    expect(await queue.take()).toBe(1);
    expect(await queue.take()).toBe(2);
    expect(await queue.take()).toBe(3);
  });

  it("blocks push while full until a take frees a slot", async () => {
    const queue = new BoundedQueue<string>(1);
    await queue.push("a");

    let pushed = false;
    const pending = queue.push("b").then(() => {
      pushed = true;
    });
    await flush();
    expect(pushed).toBe(false);
    expect(queue.size).toBe(1);

    expect(await queue.take()).toBe("a");
    await pending;
    expect(pushed).toBe(true);
    expect(await queue.take()).toBe("b");
  });

  it("wakes a waiting take when an item arrives", async () => {
    const queue = new BoundedQueue<number>(2);
    const pending = queue.take();
    await flush();

    await queue.push(7);
    await expect(pending).resolves.toBe(7);
  });

  it("returns undefined from take once closed and drained", async () => {
    const queue = new BoundedQueue<number>(2);
    await queue.push(1);
    queue.close();

    expect(await queue.take()).toBe(1);
    expect(await queue.take()).toBeUndefined();
    expect(queue.isClosed).toBe(true);
    await expect(queue.push(2)).rejects.toBeInstanceOf(QueueClosedError);
  });

  it("releases waiting takers with undefined on close", async () => {
    const queue = new BoundedQueue<number>(1);
    const pending = queue.take();
    await flush();

    queue.close();
    await expect(pending).resolves.toBeUndefined();
  });

  it("cancel drops queued items and rejects blocked producers", async () => {
    const queue = new BoundedQueue<number>(1);
    await queue.push(1);
    const blocked = queue.push(2);
    await flush();

    const reason = new CancelledError("stopped");
    const dropped = queue.cancel(reason);

    expect(dropped).toEqual([1]);
    await expect(blocked).rejects.toBe(reason);
    await expect(queue.take()).rejects.toBe(reason);
    await expect(queue.push(3)).rejects.toBe(reason);
  });

  it("an aborted waiter leaves the queue without stealing a later wake-up", async () => {
    const queue = new BoundedQueue<number>(1);
    const controller = new AbortController();

    const abandoned = queue.take(controller.signal);
    const live = queue.take();
    await flush();

    controller.abort();
    await expect(abandoned).rejects.toBeInstanceOf(CancelledError);

    await queue.push(5);
    await expect(live).resolves.toBe(5);
  });

  it("rejects push at once for an aborted signal", async () => {
    const queue = new BoundedQueue<number>(1);
    const controller = new AbortController();
    controller.abort();

    await expect(queue.push(1, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(queue.size).toBe(0);
  });
});
