import { describe, expect, it } from "vitest";

import { HELP_TEXT, executeCommand, parseCommand, renderOrder, renderPromotion } from "../src/commands.js";
import { silentLogger } from "../src/logger.js";
import { InMemorySnapshotStore } from "../src/queue/in-memory-backend.js";
import { QueueManager } from "../src/queue/manager.js";

async function freshQueue(): Promise<QueueManager> {
  return QueueManager.open({ store: new InMemorySnapshotStore(), logger: silentLogger });
}

describe("command parsing", () => {
  it.each([
    ["<@UBOT> add", "add"],
    ["<@UBOT|printbot>   DONE  ", "done"],
    ["cancel <@UBOT>", "cancel"],
    ["show", "show"],
    ["<@UBOT> add me please", "unknown"],
    ["", "unknown"]
  ])("parses %j as %s", (text, expected) => {
    expect(parseCommand(text)).toBe(expected);
  });
});

describe("command replies", () => {
  it("reports the position after adding", async () => {
    const queue = await freshQueue();
    await executeCommand(queue, "U1", "add");
    await expect(executeCommand(queue, "U2", "add")).resolves.toEqual({
      command: "add",
      accepted: true,
      text: "Okay <@U2>, I have added you to the queue at position 2"
    });
  });

  it("explains a back-to-back rejection", async () => {
    const queue = await freshQueue();
    await executeCommand(queue, "U2", "add");
    await executeCommand(queue, "U1", "add");
    await expect(executeCommand(queue, "U1", "add")).resolves.toEqual({
      command: "add",
      accepted: false,
      reason: "BACK_TO_BACK",
      text: "Sorry <@U1>, you cannot take two spots in a row; wait until someone else joins"
    });
  });

  it("explains a full solo run", async () => {
    const queue = await freshQueue();
    for (let i = 0; i < 3; i++) {
      await executeCommand(queue, "U1", "add");
    }
    const reply = await executeCommand(queue, "U1", "add");
    expect(reply.text).toBe("Sorry <@U1>, you already hold 3 spots in a row");
  });

  it("names the next participant after done", async () => {
    const queue = await freshQueue();
    await executeCommand(queue, "U1", "add");
    await executeCommand(queue, "U2", "add");
    const first = await executeCommand(queue, "U1", "done");
    expect(first.text).toBe("Okay <@U1>, you have been removed from the front of the queue. <@U2> is up next.");
    const last = await executeCommand(queue, "U2", "done");
    expect(last.text).toBe("Okay <@U2>, you have been removed from the front of the queue. The queue is now empty.");
  });

  it("explains done rejections", async () => {
    const queue = await freshQueue();
    expect((await executeCommand(queue, "U1", "done")).text).toBe("You cannot be done; the queue is empty");
    await executeCommand(queue, "U1", "add");
    expect((await executeCommand(queue, "U2", "done")).text).toBe(
      "You cannot be done; you are not at the front of the line"
    );
  });

  it("cancels a waiting entry and explains cancel rejections", async () => {
    const queue = await freshQueue();
    await executeCommand(queue, "U1", "add");
    await executeCommand(queue, "U2", "add");
    expect((await executeCommand(queue, "U1", "cancel")).text).toBe(
      '<@U1>, you are at the front of the line; say "done" when you are finished'
    );
    expect((await executeCommand(queue, "U3", "cancel")).text).toBe("You weren't in the queue to begin with");
    expect((await executeCommand(queue, "U2", "cancel")).text).toBe("Okay <@U2>, I have removed you from the queue");
  });

  it("shows the current order", async () => {
    const queue = await freshQueue();
    expect((await executeCommand(queue, "U9", "show")).text).toBe("The queue is empty");
    await executeCommand(queue, "U1", "add");
    await executeCommand(queue, "U2", "add");
    expect((await executeCommand(queue, "U9", "show")).text).toBe("Current queue:\n1. <@U1> (printing)\n2. <@U2>");
  });

  it("answers unknown commands with help", async () => {
    const queue = await freshQueue();
    await expect(executeCommand(queue, "U1", "unknown")).resolves.toEqual({
      command: "unknown",
      accepted: false,
      text: HELP_TEXT
    });
  });
});

describe("message rendering", () => {
  it("renders a single-entry order and the promotion notice", () => {
    expect(renderOrder(["U1"])).toBe("Current queue:\n1. <@U1> (printing)");
    expect(renderPromotion("U7")).toBe("<@U7>, you are now at the front of the queue. The printer is yours!");
  });
});
