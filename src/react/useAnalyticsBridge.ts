import { useContext } from "react";
import type { GuestAnalytics } from "../guest/createGuestAnalytics";
import { AnalyticsBridgeContext } from "./context";

/**
 * Hook to access the guest analytics from the nearest provider.
 */
export const useAnalyticsBridge = (): { analytics: GuestAnalytics } => {
  const context = useContext(AnalyticsBridgeContext);

  if (!context?.analytics) {
    throw new Error(
      "useAnalyticsBridge must be used within an <AnalyticsBridgeProvider>."
    );
  }

  return { analytics: context.analytics };
};
