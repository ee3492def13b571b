/**
 * Drive a town from the command line: drop cars in, jostle road weights and
 * advance every car once per tick until all have arrived or got stuck.
 *
 * Usage: npx tsx scripts/simulate.ts [town] [--cars=N] [--ticks=N] [--seed=N] [--verify]
 *
 * Options:
 *   --cars     Number of cars to add (default 3)
 *   --ticks    Maximum ticks to run (default 20)
 *   --seed     Seed for the weight jostling (default 1)
 *   --verify   Re-check car/edge bookkeeping after every mutation
 *
 * Default town: five-corners
 */

import type { WeightChange } from "@town-sim/types";
import { loadTownDescription } from "../src/config/town-config.js";
import { Simulation, createRandom } from "../src/simulation/index.js";

const args = process.argv.slice(2);
const flags = args.filter((a) => a.startsWith("--"));
const positional = args.filter((a) => !a.startsWith("--"));

function numberFlag(name: string, fallback: number): number {
  const flag = flags.find((f) => f.startsWith(`--${name}=`));
  if (!flag) return fallback;
  const value = Number(flag.slice(name.length + 3));
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`--${name} must be a non-negative integer, got "${flag}"`);
  }
  return value;
}

const townName = positional[0] ?? "five-corners";
const carCount = numberFlag("cars", 3);
const maxTicks = numberFlag("ticks", 20);
const random = createRandom(numberFlag("seed", 1));

function main() {
  const sim = Simulation.fromDescription(loadTownDescription(townName), {
    verifyInvariants: flags.includes("--verify"),
  });
  const names = sim.listVertices().map((v) => v.name);

  for (let i = 0; i < carCount; i++) {
    const from = names[Math.floor(random() * names.length)];
    const to = names[Math.floor(random() * names.length)];
    if (from === undefined || to === undefined) break;
    const car = sim.addCar(from, to);
    console.log(`${car.id}: ${from} -> ${to} via ${car.path.join(", ") || "(nothing)"} [${car.status}]`);
  }

  for (let tick = 1; tick <= maxTicks; tick++) {
    const moving = sim.listCars().filter((car) => car.status === "en-route");
    if (moving.length === 0) {
      console.log(`All cars settled after ${tick - 1} tick(s)`);
      break;
    }

    const weightChanges: WeightChange[] = [];
    for (const edge of sim.listEdges()) {
      if (edge.weight !== null && random() < 0.2) {
        weightChanges.push({ edge: edge.id, weight: Math.max(0, edge.weight + Math.round(random() * 4 - 2)) });
      }
    }

    const result = sim.applyTick({ weightChanges, advances: moving.map((car) => car.id) });
    for (const car of result.advanced) {
      const where = car.position.kind === "at-vertex" ? car.position.vertex : car.position.edge;
      console.log(`  tick ${tick}: ${car.id} at ${where} (${car.status}, ${car.remainingCost ?? "?"} to go)`);
    }
  }

  for (const car of sim.listCars()) {
    console.log(`${car.id}: ${car.status}`);
  }
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exit(1);
}
