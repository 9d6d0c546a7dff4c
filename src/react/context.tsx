import React, { createContext, ReactNode, useEffect } from "react";
import type { GuestAnalytics } from "../guest/createGuestAnalytics";

export interface AnalyticsBridgeContextValue {
  analytics: GuestAnalytics;
}

export const AnalyticsBridgeContext =
  createContext<AnalyticsBridgeContextValue | null>(null);

interface AnalyticsBridgeProviderProps {
  children: ReactNode;
  analytics: GuestAnalytics;
  /** Emit a Page event on every `history.pushState` while mounted. */
  trackPageViews?: boolean;
}

export const AnalyticsBridgeProvider = ({
  children,
  analytics,
  trackPageViews = false,
}: AnalyticsBridgeProviderProps) => {
  useEffect(() => {
    if (!trackPageViews) return;
    return analytics.watchURLChanges();
  }, [analytics, trackPageViews]);

  const value: AnalyticsBridgeContextValue = { analytics };

  return (
    <AnalyticsBridgeContext.Provider value={value}>
      {children}
    </AnalyticsBridgeContext.Provider>
  );
};
