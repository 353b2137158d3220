import { readFileSync } from "node:fs";
import { z } from "zod";
import { annotatorRegistrationSchema } from "../src/lib/schemas";
import type { Annotator } from "../src/lib/types";
import { closeRuntimeEngine, getRuntimeEngine } from "../src/lib/store/runtime";

const seedFileSchema = z.object({
  annotators: z.array(annotatorRegistrationSchema).max(10_000)
});

async function main() {
  const path = process.argv[2];
  if (!path) {
    console.error("Usage: npm run seed -- <annotators.json>");
    process.exit(1);
  }
  const parsed = seedFileSchema.safeParse(JSON.parse(readFileSync(path, "utf8")));
  if (!parsed.success) {
    console.error(JSON.stringify(parsed.error.issues, null, 2));
    process.exit(1);
  }

  const engine = await getRuntimeEngine();
  const registered: Annotator[] = [];
  for (const input of parsed.data.annotators) {
    registered.push(await engine.registerAnnotator(input));
  }
  console.log(JSON.stringify({
    registered: registered.map((a) => ({ id: a.id, reliability: a.reliability, maxConcurrentTasks: a.maxConcurrentTasks }))
  }, null, 2));
}

main()
  .then(() => closeRuntimeEngine())
  .catch((error) => {
    console.error(error);
    process.exit(1);
  });
