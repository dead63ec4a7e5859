/**
 * Destructuring Index Example
 *
 * Builds an index that keeps keys and fields only, drops the source records,
 * and rebuilds them on demand.
 * Run with: npx tsx examples/destructured.ts
 */

import { DestructuredIndex, fieldsWithout, keyOf, recordBuild } from "@record-index/core";

interface Reading {
  at: Date;
  sensor: string;
  celsius: number;
}

function main(): void {
  let readings: Reading[] = [
    { at: new Date("2024-03-01T10:00:00Z"), sensor: "north", celsius: 12.5 },
    { at: new Date("2024-03-01T09:00:00Z"), sensor: "south", celsius: 14.1 },
    { at: new Date("2024-03-01T11:00:00Z"), sensor: "north", celsius: 13.2 },
  ];

  const index = new DestructuredIndex(
    readings,
    {
      ...keyOf<Reading, "at">("at"),
      ...fieldsWithout<Reading, "at">("at"),
      ...recordBuild((at: Date, fields: Omit<Reading, "at">): Reading => ({ at, ...fields })),
    },
    { name: "readings.at", rangeEnd: "exclusive" }
  );
  readings = [];

  console.log(`📂 Indexed ${index.size} readings; source now holds ${readings.length}`);

  const morning = index.findRange(new Date("2024-03-01T09:00:00Z"), new Date("2024-03-01T11:00:00Z"));
  console.log("🔍 09:00 up to (not including) 11:00:");
  for (const [at, fields] of morning) {
    console.log(`   ${at.toISOString()}  ${fields.sensor}  ${fields.celsius}°C`);
  }

  console.log("\n♻️  Rebuilt records:");
  for (const reading of index.records()) {
    console.log(`   ${reading.sensor} @ ${reading.at.toISOString()}`);
  }
}

main();
