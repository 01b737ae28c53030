function timestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

export function log(message: string, source = "provisioner"): void {
  console.log(`${timestamp()} [${source}] ${message}`);
}

export function warn(message: string, source = "provisioner"): void {
  console.warn(`${timestamp()} [${source}] WARN ${message}`);
}

export function logError(message: string, source = "provisioner"): void {
  console.error(`${timestamp()} [${source}] ERROR ${message}`);
}
