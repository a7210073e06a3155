// Probe for the embedded engine's native dependency

/**
 * Whether better-sqlite3 loads and can open a database in this process.
 * Run once at startup and pass the result as `embeddedAvailable`.
 */
export async function detectEmbeddedCapability(): Promise<boolean> {
  try {
    const { default: Database } = await import("better-sqlite3");
    const probe = new Database(":memory:");
    probe.close();
    return true;
  } catch {
    return false;
  }
}
