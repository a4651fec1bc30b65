import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

const parsePort = (value: string | undefined, fallback: number) => {
  if (!value) {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

const webPort = parsePort(process.env.WEB_PORT, 5173);
const previewPort = parsePort(process.env.WEB_PREVIEW_PORT, 4173);
const strictPort = process.env.VITE_STRICT_PORT === "1";

export default defineConfig({
  root: "web",
  // VITE_* variables live in the repository root .env next to the pipeline's.
  envDir: "..",
  plugins: [react({})],
  server: {
    port: webPort,
    strictPort
  },
  preview: {
    port: previewPort
  },
  build: {
    outDir: "../dist/web",
    emptyOutDir: true
  }
});
