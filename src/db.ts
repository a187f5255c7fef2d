import mongoose from "mongoose";

import { formatErr, logger } from "./util/logger.js";
import { PersistenceFailure } from "./util/errors.js";

const connectDB = async (url: string) => {
  try {
    await mongoose.connect(url, { serverSelectionTimeoutMS: 10_000 });
    logger.info("MongoDB connected", {}, "mongo");
  } catch (e) {
    logger.error("MongoDB connection failed", formatErr(e), "mongo");
    throw new PersistenceFailure("Unable to connect to MongoDB", { cause: e });
  }
};

export async function disconnectDB() {
  await mongoose.disconnect();
  logger.debug("MongoDB disconnected", {}, "mongo");
}

export default connectDB;
