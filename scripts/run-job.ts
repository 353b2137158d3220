import { runMaintenanceJob, runOfferBatchesJob, runReconcileReliabilityJob, runSweepJob } from "../src/lib/jobs";
import { closeRuntimeEngine } from "../src/lib/store/runtime";

async function main() {
  const job = process.argv[2];
  switch (job) {
    case "maintenance":
      console.log(JSON.stringify(await runMaintenanceJob(), null, 2));
      break;
    case "sweep":
      console.log(JSON.stringify(await runSweepJob(), null, 2));
      break;
    case "reconcile-reliability":
      console.log(JSON.stringify(await runReconcileReliabilityJob(), null, 2));
      break;
    case "offer-batches":
      console.log(JSON.stringify(await runOfferBatchesJob(), null, 2));
      break;
    default:
      console.error("Usage: npm run job -- <maintenance|sweep|reconcile-reliability|offer-batches>");
      process.exit(1);
  }
}

main()
  .then(() => closeRuntimeEngine())
  .catch((error) => {
    console.error(error);
    process.exit(1);
  });
