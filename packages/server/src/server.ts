import { GeoStore } from "@street-guide/builder";
import { createApp } from "./app.js";
import { loadConfig } from "./config/environment.js";
import { loadStreetNetwork } from "./services/network.service.js";

const config = loadConfig();

const store = new GeoStore({ filePath: config.databasePath, readonly: true });
const network = loadStreetNetwork(store);
store.close();

const app = createApp({ network });

app.listen(config.port, config.host, () => {
  console.log(`\nStreet Guide API server running at http://${config.host}:${config.port}`);
  console.log(`Database: ${config.databasePath} (${config.nodeEnv})\n`);
});
