import type { Config } from "tailwindcss";
import typography from "@tailwindcss/typography";
import path from "path";
import { fileURLToPath } from "url";

const root = path.dirname(fileURLToPath(import.meta.url));

export default {
  content: [path.join(root, "client", "index.html"), path.join(root, "client", "src", "**", "*.{ts,tsx}")],
  theme: {
    extend: {},
  },
  plugins: [typography],
} satisfies Config;
