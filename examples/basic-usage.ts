/**
 * Basic Usage Example
 *
 * Keys one record type two ways and queries it through the reference indices.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { OwnedIndex, SortedIndex, keyOf, recordKey, sortByKey } from "@record-index/core";

interface Task {
  id: string;
  priority: number;
  title: string;
}

function main(): void {
  const tasks: Task[] = [
    { id: "task-3", priority: 8, title: "Write docs" },
    { id: "task-1", priority: 2, title: "Fix login" },
    { id: "task-2", priority: 8, title: "Ship release" },
    { id: "task-4", priority: 5, title: "Review PR" },
  ];

  const byId = keyOf<Task, "id">("id");
  const byPriority = recordKey((task: Task) => task.priority);

  console.log("🔤 Sorted by id:");
  for (const task of sortByKey(tasks, byId)) {
    console.log(`   ${task.id}  ${task.title}`);
  }

  console.log("\n🔍 Looking up by priority...");
  const index = new SortedIndex(tasks, byPriority, { name: "tasks.priority", rangeEnd: "inclusive" });
  const urgent = index.find(8);
  console.log(`✅ ${urgent.length} tasks at priority 8: ${urgent.map((t) => t.id).join(", ")}`);

  const middle = index.findRange(2, 5);
  console.log(`✅ Priorities 2..5: ${middle.map((t) => t.id).join(", ")}`);
  console.log(`   find(1) -> ${index.find(1).length} matches`);

  console.log("\n📦 Owned copies...");
  const owned = new OwnedIndex(tasks, byId);
  const [copy] = owned.find("task-1");
  if (copy) {
    copy.title = "Changed locally";
  }
  console.log(`✅ Source still reads: ${tasks[1]?.title}`);
}

main();
