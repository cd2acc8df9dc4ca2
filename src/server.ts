import 'dotenv/config';
import { createApp } from './app';
import { createServices } from './bootstrap';

const PORT = Number(process.env.PORT) || 3000;

async function main() {
  const services = await createServices();
  const app = createApp(services);

  const server = app.listen(PORT, () => {
    console.log(`Bakery quote API listening on port ${PORT}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      services
        .close()
        .then(() => process.exit(0))
        .catch((err) => {
          console.error('Failed to close services', err);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err) => {
  console.error('Failed to start API', err);
  process.exit(1);
});
