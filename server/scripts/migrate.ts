import 'dotenv/config';
import { loadConfig } from '../config';
import { initDatabase } from '../db';
import { seedDefaultReplies } from '../replies/store';

const { databasePath } = loadConfig();
const { db, sqlite } = initDatabase(databasePath);
const seeded = seedDefaultReplies(db);
sqlite.close();
console.log(
  `Migrations applied to ${databasePath}${seeded ? `; seeded ${seeded} replies` : ''}.`,
);
