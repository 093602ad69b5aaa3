export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") {
    return;
  }

  const { getConfigStatus } = await import("@/lib/config");
  const status = getConfigStatus();

  if (!status.ok) {
    console.error(`[config] ConfigurationMissing: ${status.problems.join(" ")} Route search is disabled until this is fixed.`);
    return;
  }

  console.info(`[config] ready, AI model ${status.config.geminiModel}, request timeout ${status.config.requestTimeoutMs} ms`);
}
