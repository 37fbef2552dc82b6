import 'dotenv/config';
import { startService } from './bootstrap';
import { loadConfig } from './config';

async function main() {
  const config = loadConfig();
  const service = await startService(config);
  console.log(`Server listening on http://${config.host}:${config.port}`);

  async function shutdown() {
    await service.close();
    console.log('Client statistics', {
      birdeye: service.birdeye.getStatistics(),
      solscan: service.solscan.getStatistics(),
    });
    process.exit(0);
  }
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
