import dotenv from "dotenv";

dotenv.config();

export const config = {
  NODE_ENV: process.env.NODE_ENV || "development",
  // debug | info | warn | error | silent
  LOG_LEVEL: process.env.LOG_LEVEL,
  // Directory holding .smellscan.yml when it is not the analyzed root
  SMELLSCAN_CONFIG_DIR: process.env.SMELLSCAN_CONFIG_DIR,
};
