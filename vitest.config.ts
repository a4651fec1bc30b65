import { defineConfig } from "vitest/config";

const TEST_AIRPORTS_URL = "http://localhost/airports.json";
const TEST_AIRPORTS_METADATA_URL = "http://localhost/airports-meta.json";

export default defineConfig({
  define: {
    "import.meta.env.VITE_AIRPORTS_URL": JSON.stringify(TEST_AIRPORTS_URL),
    "import.meta.env.VITE_AIRPORTS_METADATA_URL": JSON.stringify(TEST_AIRPORTS_METADATA_URL)
  },
  test: {
    environment: "node",
    env: {
      VITE_AIRPORTS_URL: TEST_AIRPORTS_URL,
      VITE_AIRPORTS_METADATA_URL: TEST_AIRPORTS_METADATA_URL
    },
    include: ["tests/**/*.test.ts", "tests/**/*.test.tsx"],
    passWithNoTests: false,
    setupFiles: ["tests/vitest-jsdom-setup.ts"]
  }
});
