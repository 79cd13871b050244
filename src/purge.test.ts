import test from "node:test";
import assert from "node:assert/strict";
import { PurgeManager, formatRemaining } from "./purge.js";
import { TaskScheduler } from "./scheduler.js";
import { FakeGateway, ManualClock, createConfig, flush, missingPermissions } from "./testHelpers.js";
import { purgeTaskId } from "./types.js";

const GUILD = "guild-1";
const CHANNEL = "700";
const NOW = Date.parse("2026-07-01T08:00:00.000Z");
const MINUTE = 60 * 1000;

function setup() {
  const { config } = createConfig();
  const gateway = new FakeGateway();
  gateway.addTextChannel(CHANNEL, "vent");
  const scheduler = new TaskScheduler();
  const clock = new ManualClock();
  clock.now = NOW;
  const purge = new PurgeManager({
    config,
    gateway,
    scheduler,
    getLocale: async () => "en",
    now: clock.clock,
    sleep: clock.sleep,
  });
  return { config, gateway, scheduler, clock, purge };
}

const countdownText = (time: string) => `🧹 This channel will be cleared in **${time}**.`;

test("formatRemaining rounds up to whole minutes", () => {
  assert.equal(formatRemaining(59_999), "<1m");
  assert.equal(formatRemaining(MINUTE), "1m");
  assert.equal(formatRemaining(MINUTE + 1000), "2m");
  assert.equal(formatRemaining(12 * MINUTE), "12m");
  assert.equal(formatRemaining(60 * MINUTE), "1h 00m");
  assert.equal(formatRemaining(65 * MINUTE), "1h 05m");
});

test("configuring then stopping leaves no task and purges nothing", async () => {
  const { config, gateway, scheduler, clock, purge } = setup();
  const handle = await purge.configure(GUILD, CHANNEL, { intervalMinutes: 30, countdown: false });
  await flush();
  assert.equal(purge.isScheduled(CHANNEL), true);
  assert.deepEqual(clock.requested, [30 * MINUTE]);

  assert.equal(await purge.stop(GUILD, CHANNEL), true);
  await handle.done;
  assert.equal(scheduler.size, 0);
  assert.deepEqual(gateway.purged, []);
  assert.deepEqual(await config.getPurgeChannels(GUILD), {});
  assert.equal(await purge.stop(GUILD, CHANNEL), false);
});

test("each interval ends in a purge and the next wait begins", async () => {
  const { gateway, scheduler, clock, purge } = setup();
  await purge.configure(GUILD, CHANNEL, { intervalMinutes: 30, countdown: false });

  await clock.advance();
  assert.deepEqual(gateway.purged, [CHANNEL]);
  await clock.advance();
  assert.deepEqual(gateway.purged, [CHANNEL, CHANNEL]);
  assert.deepEqual(clock.requested, [30 * MINUTE, 30 * MINUTE, 30 * MINUTE]);

  scheduler.cancelAll();
});

test("losing Manage Messages ends the channel's task", async () => {
  const { gateway, scheduler, clock, purge } = setup();
  const handle = await purge.configure(GUILD, CHANNEL, { intervalMinutes: 5, countdown: false });

  gateway.manageable.delete(CHANNEL);
  await clock.advance();
  await handle.done;
  assert.deepEqual(gateway.purged, []);
  assert.equal(scheduler.has(purgeTaskId(CHANNEL)), false);
});

test("a permission error during the purge also ends the task", async () => {
  const { gateway, clock, purge } = setup();
  const handle = await purge.configure(GUILD, CHANNEL, { intervalMinutes: 5, countdown: false });

  gateway.purgeError = missingPermissions();
  await clock.advance();
  await handle.done;
  assert.equal(purge.isScheduled(CHANNEL), false);
});

test("other purge failures retry after a minute and then start a full cycle", async () => {
  const { gateway, scheduler, clock, purge } = setup();
  await purge.configure(GUILD, CHANNEL, { intervalMinutes: 5, countdown: false });

  gateway.purgeError = new Error("Service Unavailable");
  await clock.advance();
  assert.deepEqual(clock.requested, [5 * MINUTE, MINUTE]);

  gateway.purgeError = null;
  await clock.advance();
  assert.deepEqual(clock.requested, [5 * MINUTE, MINUTE, 5 * MINUTE]);
  await clock.advance();
  assert.deepEqual(gateway.purged, [CHANNEL]);

  scheduler.cancelAll();
});

test("the countdown is pinned, edited every minute and replaced each cycle", async () => {
  const { config, gateway, clock, purge } = setup();
  await purge.configure(GUILD, CHANNEL, { intervalMinutes: 3, countdown: true });
  await flush();

  assert.deepEqual(gateway.sent, [{ id: "msg-1", channelId: CHANNEL, content: countdownText("3m") }]);
  assert.deepEqual(gateway.pinned, [{ channelId: CHANNEL, messageId: "msg-1" }]);
  assert.equal(await config.getCountdownMessageId(GUILD, CHANNEL), "msg-1");

  await clock.advance();
  await clock.advance();
  assert.deepEqual(
    gateway.edits.map((e) => e.content),
    [countdownText("2m"), countdownText("1m")]
  );
  assert.deepEqual(gateway.purged, []);

  await clock.advance();
  assert.deepEqual(gateway.purged, [CHANNEL]);
  assert.equal(gateway.sent.length, 2);
  assert.equal(gateway.sent[1]?.content, countdownText("3m"));
  assert.equal(await config.getCountdownMessageId(GUILD, CHANNEL), "msg-2");
  assert.deepEqual(gateway.deleted, []);

  await purge.stop(GUILD, CHANNEL);
  assert.deepEqual(gateway.deleted, [{ channelId: CHANNEL, messageId: "msg-2" }]);
  assert.equal(await config.getCountdownMessageId(GUILD, CHANNEL), undefined);
});

test("a countdown left from before a restart is deleted first", async () => {
  const { config, gateway, scheduler, purge } = setup();
  await config.setCountdownMessageId(GUILD, CHANNEL, "old-1");
  await purge.configure(GUILD, CHANNEL, { intervalMinutes: 10, countdown: true });
  await flush();

  assert.deepEqual(gateway.deleted, [{ channelId: CHANNEL, messageId: "old-1" }]);
  assert.equal(await config.getCountdownMessageId(GUILD, CHANNEL), "msg-1");
  scheduler.cancelAll();
});

test("stopping while the countdown is being posted still removes it", async () => {
  const { config, gateway, scheduler, purge } = setup();
  let release: () => void = () => {};
  gateway.sendGate = new Promise<void>((resolve) => {
    release = resolve;
  });
  await purge.configure(GUILD, CHANNEL, { intervalMinutes: 10, countdown: true });
  await flush();
  assert.deepEqual(gateway.sent, []);

  const stopping = purge.stop(GUILD, CHANNEL);
  await flush();
  release();

  assert.equal(await stopping, true);
  assert.deepEqual(gateway.sent, [{ id: "msg-1", channelId: CHANNEL, content: countdownText("10m") }]);
  assert.deepEqual(gateway.deleted, [{ channelId: CHANNEL, messageId: "msg-1" }]);
  assert.equal(await config.getCountdownMessageId(GUILD, CHANNEL), undefined);
  assert.equal(scheduler.size, 0);
});

test("an interval beyond the timer limit does not purge early", async () => {
  const { config } = createConfig();
  const gateway = new FakeGateway();
  gateway.addTextChannel(CHANNEL, "vent");
  const purge = new PurgeManager({ config, gateway, scheduler: new TaskScheduler(), getLocale: async () => "en" });

  await purge.configure(GUILD, CHANNEL, { intervalMinutes: 40_000, countdown: false });
  await new Promise((resolve) => setTimeout(resolve, 50));
  assert.deepEqual(gateway.purged, []);
  assert.equal(await purge.stop(GUILD, CHANNEL), true);
});

test("restore starts only the channels the bot can still manage", async () => {
  const { config, gateway, scheduler, purge } = setup();
  gateway.addTextChannel("701", "locked", false);
  await config.setPurgeChannel(GUILD, CHANNEL, { intervalMinutes: 30, countdown: false });
  await config.setPurgeChannel(GUILD, "701", { intervalMinutes: 30, countdown: false });

  assert.equal(await purge.restore(), 1);
  assert.deepEqual(scheduler.ids(), [purgeTaskId(CHANNEL)]);
  assert.deepEqual(Object.keys(await config.getPurgeChannels(GUILD)), [CHANNEL, "701"]);
  scheduler.cancelAll();
});
