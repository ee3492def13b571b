import { createApp } from "./app.js";
import { loadServerConfig } from "./config.js";
import { SimulationService } from "./services/simulation.service.js";

const config = loadServerConfig();
const service = SimulationService.load(config);
const app = createApp(service);

app.listen(config.port, () => {
  const stats = service.getStats();
  console.log(`\n[server] Town simulation API running at http://localhost:${config.port}`);
  console.log(
    `[server] Town "${stats.name}": ${stats.vertices} vertices, ${stats.edges} edges` +
      (config.verifyInvariants ? " (verifying invariants)" : "") +
      "\n",
  );
});
