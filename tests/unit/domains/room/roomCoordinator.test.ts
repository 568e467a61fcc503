import { describe, it, expect, vi, afterEach } from "vitest";
import { RoomCoordinator, type RoomCoordinatorOptions } from "@src/domains/room/roomCoordinator.js";
import { engineTarget, peerTarget, type EngineBinding } from "@src/domains/engine/engine.types.js";
import { FakeEngine, FakeLink, flush, silentLogger } from "../../helpers/fakes.js";

function createCoordinator(overrides: Partial<RoomCoordinatorOptions> = {}) {
  const engine = new FakeEngine();
  const onTerminated = vi.fn<(coordinator: RoomCoordinator) => void>();
  const coordinator = new RoomCoordinator("alpha", {
    engineFactory: async () => engine,
    logger: silentLogger(),
    startTimeoutMs: 1_000,
    shutdownTimeoutMs: 1_000,
    emptyRoomTimeoutMs: 0,
    onTerminated,
    ...overrides,
  });
  return { coordinator, engine, onTerminated };
}

async function startedRoom(overrides: Partial<RoomCoordinatorOptions> = {}) {
  const setup = createCoordinator(overrides);
  await setup.coordinator.start();
  return setup;
}

async function roomWithPeers(...peerIds: string[]) {
  const setup = await startedRoom();
  const links = peerIds.map((peerId) => new FakeLink(peerId));
  for (const link of links) {
    await setup.coordinator.registerPeer(link.peerId, link);
  }
  return { ...setup, links };
}

afterEach(() => {
  vi.useRealTimers();
});

describe("RoomCoordinator start", () => {
  it("becomes active and takes the engine's event stream", async () => {
    const { coordinator, engine } = createCoordinator();
    expect(coordinator.state).toBe("starting");

    await coordinator.start();

    expect(coordinator.state).toBe("active");
    expect(coordinator.isActive).toBe(true);
    expect(engine.eventsCalls).toBe(1);
  });

  it("fails and terminates when the engine factory rejects", async () => {
    const { coordinator, onTerminated } = createCoordinator({
      engineFactory: async () => {
        throw new Error("no capacity");
      },
    });

    await expect(coordinator.start()).rejects.toThrow("no capacity");
    expect(coordinator.state).toBe("terminated");
    await expect(coordinator.whenTerminated()).resolves.toBeUndefined();
    expect(onTerminated).not.toHaveBeenCalled();
  });

  it("fails when the engine factory throws synchronously", async () => {
    const { coordinator } = createCoordinator({
      engineFactory: () => {
        throw new Error("factory broken");
      },
    });

    await expect(coordinator.start()).rejects.toThrow("factory broken");
    expect(coordinator.state).toBe("terminated");
  });

  it("fails and shuts the engine down when its event stream cannot be taken", async () => {
    const { coordinator, engine, onTerminated } = createCoordinator();
    vi.spyOn(engine, "events").mockImplementation(() => {
      throw new Error("stream unavailable");
    });

    await expect(coordinator.start()).rejects.toThrow("stream unavailable");

    expect(coordinator.state).toBe("terminated");
    expect(engine.commands).toEqual([{ kind: "shutdown" }]);
    expect(onTerminated).not.toHaveBeenCalled();
    await expect(coordinator.registerPeer("p1", new FakeLink("p1"))).resolves.toEqual({
      success: false,
      error: "Room is closing, try again",
      retryable: true,
    });
  });

  it("times out a slow engine and shuts it down when it finally arrives", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    let resolveEngine: (engine: EngineBinding) => void = () => {};
    const { coordinator } = createCoordinator({
      engineFactory: () =>
        new Promise<EngineBinding>((resolve) => {
          resolveEngine = resolve;
        }),
    });

    const starting = coordinator.start();
    const assertion = expect(starting).rejects.toThrow("Engine start timed out after 1000ms");
    await vi.advanceTimersByTimeAsync(1_000);
    await assertion;
    expect(coordinator.state).toBe("terminated");

    const lateEngine = new FakeEngine();
    resolveEngine(lateEngine);
    await flush();

    expect(lateEngine.commands).toEqual([{ kind: "shutdown" }]);
  });

  it("cannot be started twice", async () => {
    const { coordinator } = await startedRoom();

    await expect(coordinator.start()).rejects.toThrow("Room alpha cannot start from state active");
  });
});

describe("RoomCoordinator peers", () => {
  it("registers a peer and adds it to the engine", async () => {
    const { coordinator, engine } = await startedRoom();
    const link = new FakeLink("p1");

    await expect(coordinator.registerPeer("p1", link)).resolves.toEqual({ success: true });

    expect(engine.commands).toEqual([{ kind: "add-peer", peerId: "p1" }]);
    expect(coordinator.getPeerIds()).toEqual(["p1"]);
    expect(coordinator.getStats()).toEqual({
      roomId: "alpha",
      state: "active",
      peerCount: 1,
      createdAt: expect.any(Number),
    });
  });

  it("refuses a duplicate peer id", async () => {
    const { coordinator, engine } = await roomWithPeers("p1");

    await expect(coordinator.registerPeer("p1", new FakeLink("p1"))).resolves.toEqual({
      success: false,
      error: "Peer already added",
      retryable: true,
    });
    expect(engine.kinds()).toEqual(["add-peer"]);
    expect(coordinator.peerCount).toBe(1);
  });

  it("removes a peer whose liveness is lost and tells the engine", async () => {
    const { coordinator, engine, links } = await roomWithPeers("p1", "p2");
    const [first] = links;

    first?.crash();
    await flush();

    expect(coordinator.getPeerIds()).toEqual(["p2"]);
    expect(engine.commands).toEqual([
      { kind: "add-peer", peerId: "p1" },
      { kind: "add-peer", peerId: "p2" },
      { kind: "remove-peer", peerId: "p1" },
    ]);
    expect(coordinator.state).toBe("active");
  });

  it("rolls back a registration the engine rejects", async () => {
    const { coordinator, engine, links } = await roomWithPeers("p1", "p2");
    const [first, second] = links;

    engine.emit({
      kind: "command-failed",
      target: peerTarget("p2"),
      payload: { command: "add-peer", reason: "Room is full" },
    });
    await flush();

    expect(second?.evictions).toEqual(["Room is full"]);
    expect(first?.evictions).toEqual([]);
    expect(coordinator.getPeerIds()).toEqual(["p1"]);
    expect(engine.kinds()).toEqual(["add-peer", "add-peer"]);
    expect(coordinator.state).toBe("active");
  });

  it("reports a peer the engine refuses without touching the room", async () => {
    const { coordinator, engine, links } = await roomWithPeers("p1");
    engine.refuseAddPeer = "Room is full";
    const second = new FakeLink("p2");

    await expect(coordinator.registerPeer("p2", second)).resolves.toEqual({
      success: false,
      error: "Room is full",
      retryable: false,
    });

    expect(second.evictions).toEqual([]);
    expect(links[0]?.evictions).toEqual([]);
    expect(coordinator.getPeerIds()).toEqual(["p1"]);
    expect(coordinator.state).toBe("active");
  });

  it("rolls back when add-peer throws and closes the then empty room", async () => {
    const { coordinator, engine, onTerminated } = await startedRoom();
    engine.commandError = new Error("engine gone");

    await expect(coordinator.registerPeer("p1", new FakeLink("p1"))).resolves.toEqual({
      success: false,
      error: "Room is closing, try again",
      retryable: true,
    });

    expect(coordinator.peerCount).toBe(0);
    expect(coordinator.state).toBe("terminated");
    expect(onTerminated).toHaveBeenCalledWith(coordinator);
  });

  it("refuses registrations once terminating", async () => {
    const { coordinator, engine } = await startedRoom();
    engine.ackShutdown = false;

    const terminating = coordinator.terminate("closing");
    const registered = coordinator.registerPeer("late", new FakeLink("late"));

    await expect(registered).resolves.toEqual({
      success: false,
      error: "Room is closing, try again",
      retryable: true,
    });
    expect(coordinator.state).toBe("terminating");

    engine.emit({ kind: "shutdown-complete", target: engineTarget, payload: null });
    await terminating;
    expect(coordinator.state).toBe("terminated");
  });
});

describe("RoomCoordinator relay", () => {
  it("forwards client payloads to the engine unmodified, tagged with the peer id", async () => {
    const { coordinator, engine } = await roomWithPeers("p1");
    const payload = { type: "signal", data: { to: "p2", signal: { sdp: "v=0" } } };

    coordinator.relayClientEvent("p1", payload);
    await flush();

    const command = engine.commands.at(-1);
    expect(command).toEqual({ kind: "media-event", peerId: "p1", data: payload });
    expect(command?.kind === "media-event" ? command.data : undefined).toBe(payload);
  });

  it("drops client events from unknown peers", async () => {
    const { coordinator, engine, links } = await roomWithPeers("p1", "p2");

    coordinator.relayClientEvent("ghost", { type: "join" });
    links[0]?.crash();
    await flush();
    coordinator.relayClientEvent("p1", { type: "join" });
    await flush();

    expect(engine.kinds()).toEqual(["add-peer", "add-peer", "remove-peer"]);
  });

  it("delivers a targeted engine event to that peer only", async () => {
    const { engine, links } = await roomWithPeers("p1", "p2");
    const [first, second] = links;
    const payload = { type: "signal", data: { from: "p1" } };

    engine.emit({ kind: "media-event", target: peerTarget("p2"), payload });
    await flush();

    expect(second?.delivered).toEqual([payload]);
    expect(second?.delivered[0]).toBe(payload);
    expect(first?.delivered).toEqual([]);
  });

  it("delivers broadcasts to every peer except the excluded one", async () => {
    const { engine, links } = await roomWithPeers("p1", "p2", "p3");
    const [first, second, third] = links;

    engine.emit({ kind: "media-event", target: { type: "broadcast" }, payload: "all" });
    engine.emit({ kind: "media-event", target: { type: "broadcast", except: "p1" }, payload: "others" });
    await flush();

    expect(first?.delivered).toEqual(["all"]);
    expect(second?.delivered).toEqual(["all", "others"]);
    expect(third?.delivered).toEqual(["all", "others"]);
  });

  it("drops engine events for unknown peers", async () => {
    const { coordinator, engine, links } = await roomWithPeers("p1");

    engine.emit({ kind: "media-event", target: peerTarget("ghost"), payload: "lost" });
    await flush();

    expect(links[0]?.delivered).toEqual([]);
    expect(coordinator.state).toBe("active");
  });

  it("keeps per-sender ordering from engine to peer", async () => {
    const { engine, links } = await roomWithPeers("p1");

    for (let i = 0; i < 5; i++) {
      engine.emit({ kind: "media-event", target: peerTarget("p1"), payload: i });
    }
    await flush();

    expect(links[0]?.delivered).toEqual([0, 1, 2, 3, 4]);
  });
});

describe("RoomCoordinator termination", () => {
  it("shuts the engine down when the last peer is gone", async () => {
    const { coordinator, engine, links, onTerminated } = await roomWithPeers("p1");

    links[0]?.crash();
    await flush();

    expect(engine.kinds()).toEqual(["add-peer", "remove-peer", "shutdown"]);
    expect(coordinator.state).toBe("terminated");
    expect(onTerminated).toHaveBeenCalledTimes(1);
    expect(onTerminated).toHaveBeenCalledWith(coordinator);
    await expect(coordinator.whenTerminated()).resolves.toBeUndefined();
  });

  it("holds a terminate() received while starting until the room is active", async () => {
    const { coordinator, engine, onTerminated } = createCoordinator();

    const starting = coordinator.start();
    const terminated = coordinator.terminate("server_shutdown");
    await starting;
    await terminated;

    expect(engine.kinds()).toEqual(["shutdown"]);
    expect(coordinator.state).toBe("terminated");
    expect(onTerminated).toHaveBeenCalledWith(coordinator);
  });

  it("evicts every peer on terminate()", async () => {
    const { coordinator, engine, links } = await roomWithPeers("p1", "p2");

    await coordinator.terminate("server_shutdown");

    expect(links.map((link) => link.evictions)).toEqual([["server_shutdown"], ["server_shutdown"]]);
    expect(engine.kinds()).toEqual(["add-peer", "add-peer", "shutdown"]);
    expect(coordinator.peerCount).toBe(0);
    expect(coordinator.state).toBe("terminated");

    // Already terminated: resolves right away
    await expect(coordinator.terminate("again")).resolves.toBeUndefined();
  });

  it("gives up waiting for the engine after the shutdown timeout", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const { coordinator, engine, links } = await roomWithPeers("p1");
    engine.ackShutdown = false;

    links[0]?.crash();
    await flush();
    expect(coordinator.state).toBe("terminating");

    await vi.advanceTimersByTimeAsync(999);
    await flush();
    expect(coordinator.state).toBe("terminating");

    await vi.advanceTimersByTimeAsync(1);
    await flush();
    expect(coordinator.state).toBe("terminated");
  });

  it("closes a room that stays empty", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const { coordinator, engine } = await startedRoom({ emptyRoomTimeoutMs: 500 });

    await vi.advanceTimersByTimeAsync(499);
    await flush();
    expect(coordinator.state).toBe("active");

    await vi.advanceTimersByTimeAsync(1);
    await flush();
    expect(coordinator.state).toBe("terminated");
    expect(engine.kinds()).toEqual(["shutdown"]);
  });

  it("keeps a room whose first peer registered in time", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const { coordinator } = await startedRoom({ emptyRoomTimeoutMs: 500 });

    await coordinator.registerPeer("p1", new FakeLink("p1"));
    await vi.advanceTimersByTimeAsync(500);
    await flush();

    expect(coordinator.state).toBe("active");
  });
});

describe("RoomCoordinator engine failure", () => {
  it("evicts everyone when the engine crashes", async () => {
    const { coordinator, engine, links, onTerminated } = await roomWithPeers("p1", "p2");

    engine.emit({ kind: "crashed", target: engineTarget, payload: { reason: "worker died" } });
    await flush();

    expect(links.map((link) => link.evictions)).toEqual([["engine_failed"], ["engine_failed"]]);
    expect(coordinator.state).toBe("terminated");
    expect(onTerminated).toHaveBeenCalledTimes(1);
  });

  it("evicts everyone when the event stream ends unexpectedly", async () => {
    const { coordinator, engine, links } = await roomWithPeers("p1");

    engine.endStream();
    await flush();

    expect(links[0]?.evictions).toEqual(["engine_failed"]);
    expect(coordinator.state).toBe("terminated");
  });

  it("evicts everyone when the event stream fails", async () => {
    const { coordinator, engine, links } = await roomWithPeers("p1");

    engine.failStream(new Error("pipe closed"));
    await flush();

    expect(links[0]?.evictions).toEqual(["engine_failed"]);
    expect(coordinator.state).toBe("terminated");
  });
});
