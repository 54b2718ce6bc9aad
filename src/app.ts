import { loadConfig } from "./config/env.js";
import { InMemoryEventBus } from "./infrastructure/event-bus/in-memory-event-bus.js";
import { EventStreams } from "./infrastructure/event-bus/streams.js";
import { createConsoleLogger } from "./infrastructure/logging/logger.js";
import { formatContractSummary } from "./modules/contract-drafting/contract.js";
import type { Contract } from "./modules/contract-drafting/types.js";
import { SupplyChainOrchestrator } from "./modules/orchestration/orchestrator.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createConsoleLogger({ name: "supply-chain-pipeline", level: config.logLevel });
  const eventBus = new InMemoryEventBus();
  const orchestrator = new SupplyChainOrchestrator({ config, eventBus, logger });

  const result = await orchestrator.runFullPipeline();

  console.log("Pipeline result:");
  console.log(JSON.stringify(result, null, 2));
  for (const record of eventBus.readStream<Contract>(EventStreams.CONTRACT_DRAFTS)) {
    console.log(formatContractSummary(record.message));
  }
  console.log(
    "Stream lengths:",
    Object.fromEntries(
      Object.values(EventStreams).map((stream) => [stream, eventBus.streamLength(stream)])
    )
  );

  if (!result.success) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
