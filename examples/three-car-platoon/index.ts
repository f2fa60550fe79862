/**
 * Three-Car Platoon Example - leader plus two followers in one process
 *
 * Starts a relay on an ephemeral port, spawns three sedans in formation
 * and runs one VehicleSession per car. The leader drives the
 * cruise-soft-stop profile while the followers keep their gap.
 *
 * Usage:
 *   npx tsx examples/three-car-platoon/index.ts
 */

import { MessageRelay, PeerClient, SimWorld, VehicleSession, createLogger } from 'convoy';

const TICK_MS = 50;
const RUN_FOR_MS = 24_000;

const quiet = { info: () => {}, warn: () => {}, error: () => {}, debug: () => {} };

const relay = new MessageRelay({ port: 0 }, quiet);
const address = await relay.start();
console.log(`Relay on ${address.host}:${address.port}`);

const world = new SimWorld({ logger: quiet });
const names = ['lead', 'car-2', 'car-3'];
const sessions = names.map((peerId) => {
  const { vehicle, slot } = world.spawnInFormation('sedan');
  console.log(`${peerId}: ${vehicle.id} in slot ${slot}`);
  return new VehicleSession({
    vehicle,
    client: new PeerClient({}, quiet),
    relay: address,
    peerId,
    tickMs: TICK_MS,
    logger: peerId === 'lead' ? createLogger(peerId) : quiet,
  });
});

world.start(TICK_MS);

// Join one tick apart so every car sees the previous JOIN first
for (const session of sessions) {
  await session.start();
  session.join();
  await new Promise((resolve) => setTimeout(resolve, 2 * TICK_MS));
}

sessions[0].runProfile('cruise-soft-stop');

let lastPrint = 0;
sessions[sessions.length - 1].on('tick', (report) => {
  if (report.at - lastPrint < 1000) return;
  lastPrint = report.at;
  const speeds = world.getVehicles().map((vehicle) => vehicle.getSpeed().toFixed(1));
  console.log(
    `[${report.members.join(', ')}] tail ${report.mode}, gap ${report.distance?.toFixed(1) ?? '-'} m, speeds ${speeds.join(' / ')} m/s`
  );
});

await new Promise((resolve) => setTimeout(resolve, RUN_FOR_MS));

for (const session of [...sessions].reverse()) {
  await session.leave();
}
world.stop();
await relay.stop();
console.log('Done');
