import mongoose from "mongoose";

import { connectMongo, closeMongo } from "../src/config/db.js";
import { logger } from "../src/config/logger.js";
import { FriendRequest, Friendship } from "../src/modules/friends/model.js";
import { Message } from "../src/modules/messages/model.js";
import { User } from "../src/modules/users/model.js";

async function main() {
  await connectMongo();

  // 1) Sync model indexes (creates collections if needed)
  const models = [User, FriendRequest, Friendship, Message];
  for (const m of models) {
    logger.info(`syncing indexes for ${m.modelName}`);
    await m.syncIndexes();
  }

  // 2) Print what ended up on each collection
  const db = mongoose.connection.db;
  if (!db) throw new Error("Mongo connection not ready");
  for (const m of models) {
    const colName = m.collection.collectionName;
    const exists = await db.listCollections({ name: colName }).hasNext();
    if (!exists) {
      logger.info(`${colName}: (no collection yet)`);
      continue;
    }
    const idx = await db.collection(colName).indexes();
    logger.info(`${colName} indexes`, { indexes: idx.map((i) => i.name) });
  }

  await closeMongo();
}

main().catch((err: unknown) => {
  logger.error("sync-indexes failed", {
    message: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
