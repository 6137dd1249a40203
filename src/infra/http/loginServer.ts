import dotenv from 'dotenv';
import { loadConfig } from '../../config.js';
import { createPool } from '../db/pool.js';
import { UserRepo } from '../db/userRepo.js';
import { LoginAttemptRepo } from '../db/loginAttemptRepo.js';
import { createLoginApp } from './loginApp.js';

dotenv.config();

const config = loadConfig();
const pool = createPool(config.database);

const app = createLoginApp({
  config,
  userRepo: new UserRepo(pool),
  loginAttempts: new LoginAttemptRepo(pool),
  ping: () => pool.query('SELECT 1'),
});

const PORT = config.http.loginPort;

app.listen(PORT, () => {
  console.log(`Login service running on http://localhost:${PORT}`);
  console.log(`Health check: http://localhost:${PORT}/healthz`);
  console.log(`API docs: http://localhost:${PORT}/docs`);
});
