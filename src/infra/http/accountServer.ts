import dotenv from 'dotenv';
import { loadConfig } from '../../config.js';
import { createPool } from '../db/pool.js';
import { UserRepo } from '../db/userRepo.js';
import { AccountRepo } from '../db/accountRepo.js';
import { createAccountApp } from './accountApp.js';

dotenv.config();

const config = loadConfig();
const pool = createPool(config.database);

const app = createAccountApp({
  config,
  userRepo: new UserRepo(pool),
  accountRepo: new AccountRepo(pool),
  ping: () => pool.query('SELECT 1'),
});

const PORT = config.http.accountPort;

app.listen(PORT, () => {
  console.log(`Account service running on http://localhost:${PORT}`);
  console.log(`Health check: http://localhost:${PORT}/healthz`);
});
