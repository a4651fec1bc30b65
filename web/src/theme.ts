import { createTheme } from "@mantine/core";

export const fuelNearMeTheme = createTheme({
  defaultRadius: "md",
  primaryColor: "green",
  components: {
    Badge: {
      defaultProps: {
        variant: "light",
        radius: "sm"
      }
    },
    Alert: {
      defaultProps: {
        variant: "light"
      }
    }
  }
});
