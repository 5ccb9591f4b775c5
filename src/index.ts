import { getConfig } from './config/index.js';
import { initTracing, shutdownTracing } from './config/tracing.js';
import { initializeSchema } from './db/schema.js';
import { createApp } from './app.js';
import { getArchiveServices } from './services/archiveServices.js';

// Initialize store and start server
async function startServer() {
  try {
    const config = getConfig();
    initTracing(config);

    const services = await getArchiveServices();

    // Initialize Neo4j schema (constraints and indexes)
    if (services.store.backend === 'neo4j') {
      await initializeSchema();
    }

    const app = createApp(services);
    app.listen(config.PORT, () => {
      console.log(`🚀 Server running on http://localhost:${config.PORT}`);
      console.log(`📝 Environment: ${config.NODE_ENV}`);
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

// Graceful shutdown
async function shutdown() {
  console.log('\n🛑 Shutting down gracefully...');
  const services = await getArchiveServices();
  await services.close();
  await shutdownTracing();
  process.exit(0);
}

process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

void startServer();
