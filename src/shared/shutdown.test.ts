import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createShutdownManager } from "./shutdown.js";

describe("shutdown", () => {
  // Store original methods using bind to avoid unbound-method issues
  const originalProcessOn = process.on.bind(process);
  const originalProcessExit = process.exit.bind(process);

  let registeredHandlers: Map<string, () => void>;
  let mockProcessOn: ReturnType<typeof vi.fn>;
  let mockProcessExit: ReturnType<typeof vi.fn>;

  const trigger = async (signal: string): Promise<void> => {
    const handler = registeredHandlers.get(signal);
    if (!handler) throw new Error(`No handler registered for ${signal}`);
    handler();
    // Let the async cleanup chain settle
    await new Promise((resolve) => setTimeout(resolve, 20));
  };

  beforeEach(() => {
    registeredHandlers = new Map();
    mockProcessOn = vi.fn((event: string, handler: () => void) => {
      registeredHandlers.set(event, handler);
      return process;
    });
    mockProcessExit = vi.fn();

    process.on = mockProcessOn as unknown as typeof process.on;
    process.exit = mockProcessExit as unknown as typeof process.exit;
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.on = originalProcessOn;
    process.exit = originalProcessExit;
    vi.restoreAllMocks();
  });

  it("registers SIGINT and SIGTERM handlers", () => {
    createShutdownManager().setup();

    expect(mockProcessOn).toHaveBeenCalledWith("SIGINT", expect.any(Function));
    expect(mockProcessOn).toHaveBeenCalledWith("SIGTERM", expect.any(Function));
  });

  it("aborts its signal when shutdown begins", async () => {
    const manager = createShutdownManager();
    manager.setup();
    expect(manager.signal.aborted).toBe(false);

    await trigger("SIGINT");

    expect(manager.signal.aborted).toBe(true);
  });

  it("runs chained cleanups in registration order before closing the browser", async () => {
    const manager = createShutdownManager();
    manager.setup();
    const order: string[] = [];

    const mockBrowser = {
      close: vi.fn(() => {
        order.push("browser");
        return Promise.resolve();
      }),
    };
    manager.registerBrowser(mockBrowser);
    manager.registerCleanup(() => {
      order.push("loop");
    });
    manager.registerCleanup(async () => {
      order.push("server");
      await Promise.resolve();
    });

    await trigger("SIGINT");

    expect(order).toEqual(["loop", "server", "browser"]);
    expect(mockProcessExit).toHaveBeenCalledWith(0);
  });

  it("still exits cleanly when a cleanup fails", async () => {
    const manager = createShutdownManager();
    manager.setup();
    manager.registerCleanup(vi.fn().mockRejectedValue(new Error("Cleanup failed")));

    await trigger("SIGINT");

    expect(mockProcessExit).toHaveBeenCalledWith(0);
  });

  it("forces exit on a second signal", async () => {
    const manager = createShutdownManager();
    manager.setup();
    manager.registerCleanup(() => new Promise<void>(() => undefined));

    await trigger("SIGINT");
    await trigger("SIGINT");

    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });
});
