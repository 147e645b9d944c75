import http from 'http';
import { WebSocketServer } from 'ws';
import config from './config';
import { createApp, getEnvironmentPath } from './app';
import { checkDatabaseConnection } from './db';
import { ensureAdminExists } from './initAdmin';
import { verifyToken } from './middleware/authenticateToken';
import { registerNotificationServer, tagClient } from './utils/notification';

const port = config.port || 3000;
const environmentPath = getEnvironmentPath(config.environment);

// Create HTTP server
const server = http.createServer(createApp());

// WebSocket server setup: clients authenticate with ?token=<jwt>
const wss = new WebSocketServer({ server });
wss.on('connection', (ws, req) => {
  const token = new URL(req.url ?? '/', 'http://localhost').searchParams.get('token');

  verifyToken(token ?? '')
    .then((user) => {
      if (!user) {
        ws.close(1008, 'Invalid token');
        return;
      }
      tagClient(ws, { userType: user.userType, id: user.id });
      console.log(`WebSocket connected for ${user.userType} ${user.id}`);
    })
    .catch((error) => {
      console.error('Error authenticating WebSocket client:', error);
      ws.close(1011, 'Authentication failed');
    });
});
registerNotificationServer(wss);

const start = async () => {
  await checkDatabaseConnection();
  await ensureAdminExists();

  // Start server
  server.listen(port, () => {
    console.log(`Server is running in ${config.environment} mode on port ${port}`);
    console.log(`Swagger documentation available at http://localhost:${port}${environmentPath}/api-docs`);
  });
};

start().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
