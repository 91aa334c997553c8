import { createApp } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`Portfolio report service listening on http://localhost:${config.port}`);
  console.log(`Tax rates: income ${config.taxRates.incomeTaxPercent}%, capital gains ${config.taxRates.capitalGainsTaxPercent}%`);
});
