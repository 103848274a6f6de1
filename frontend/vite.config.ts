import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react-swc";
import tailwindcss from "tailwindcss";
import autoprefixer from "autoprefixer";

// API-serveren (server/) kjører på 5000 i dev; Vite proxier /api dit.
const API_TARGET = "http://localhost:5000";

export default defineConfig({
  plugins: [react()],
  css: {
    postcss: {
      plugins: [
        tailwindcss({ content: ["./index.html", "./src/**/*.{ts,tsx}"] }),
        autoprefixer(),
      ],
    },
  },
  server: {
    port: 5173,
    strictPort: true, // feiler heller enn å hoppe til 5174
    proxy: {
      "/api": API_TARGET,
    },
  },
  test: {
    environment: "jsdom",
    globals: true,
    include: ["src/tests/**/*.test.{ts,tsx}"],
  },
});
