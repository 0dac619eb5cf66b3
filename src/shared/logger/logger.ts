import pino from "pino";

const levelFor = (nodeEnv: string | undefined): string => {
  if (nodeEnv === "production") {
    return "info";
  }

  return nodeEnv === "test" ? "silent" : "debug";
};

export const logger = pino({
  name: "fundamentals-pipeline",
  level: levelFor(process.env.NODE_ENV),
});
