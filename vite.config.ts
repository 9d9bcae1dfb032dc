import { defineConfig } from "vite";
import react from "@vitejs/plugin-react-swc";

// https://vitejs.dev/config/
export default defineConfig(() => ({
  base: process.env.NODE_ENV === "development" ? "/" : process.env.VITE_BASE_PATH || "/",
  optimizeDeps: {
    entries: ["src/main.tsx"],
  },
  plugins: [react()],
  server: {
    host: process.env.FRONTEND_HOST || "0.0.0.0",
    port: parseInt(process.env.FRONTEND_PORT || "5173", 10),
  },
}));
