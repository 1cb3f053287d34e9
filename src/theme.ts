import { createSystem, defaultConfig, defineConfig } from "@chakra-ui/react";

const config = defineConfig({
  theme: {
    keyframes: {
      "sheet-in": {
        from: { opacity: "0", transform: "scale(0.1)" },
        to: { opacity: "1", transform: "scale(1)" },
      },
      "sheet-out": {
        from: { opacity: "1", transform: "scale(1)" },
        to: { opacity: "0", transform: "scale(0.1)" },
      },
      "trigger-in": {
        from: { opacity: "0", transform: "translateY(-100%)" },
        to: { opacity: "1", transform: "translateY(0)" },
      },
      "trigger-out": {
        from: { opacity: "1", transform: "translateY(0)" },
        to: { opacity: "0", transform: "translateY(-100%)" },
      },
    },
  },
});

export const system = createSystem(defaultConfig, config);
