import pino from "pino";

const levelFor = (nodeEnv: string | undefined): pino.LevelWithSilent => {
  if (nodeEnv === "production") {
    return "info";
  }

  return nodeEnv === "test" ? "silent" : "debug";
};

export const logger = pino({
  name: "trends-analyser",
  level: levelFor(process.env.NODE_ENV),
});

export type Logger = pino.Logger;

export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
