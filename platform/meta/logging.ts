export type MetaLogger = (message: string, source?: string) => void;

export function log(message: string, source = "meta"): void {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

export const silentLogger: MetaLogger = () => {};
