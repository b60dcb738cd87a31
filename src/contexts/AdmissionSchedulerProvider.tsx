/**
 * AdmissionSchedulerProvider - React Context Provider for the Admission Scheduler
 *
 * Makes one AdmissionScheduler instance available to UI code (countdown
 * overlay, shop/loading screens that block admission, "Next" buttons that
 * request manual triggers).
 *
 * The provider does not own the scheduler's lifecycle: the host creates and
 * starts it (createAdmissionScheduler) and stops it on teardown.
 */

import React, { createContext, useContext, type ReactNode } from 'react';
import type { AdmissionScheduler } from '../admission/admissionScheduler';

const AdmissionSchedulerContext = createContext<AdmissionScheduler | null>(null);

/**
 * Hook to access the scheduler
 * @throws {Error} If used outside AdmissionSchedulerProvider
 */
export const useAdmissionScheduler = (): AdmissionScheduler => {
  const scheduler = useContext(AdmissionSchedulerContext);
  if (!scheduler) {
    throw new Error('useAdmissionScheduler must be used within AdmissionSchedulerProvider');
  }
  return scheduler;
};

interface AdmissionSchedulerProviderProps {
  scheduler: AdmissionScheduler;
  children: ReactNode;
}

export const AdmissionSchedulerProvider: React.FC<AdmissionSchedulerProviderProps> = ({ scheduler, children }) => {
  return (
    <AdmissionSchedulerContext.Provider value={scheduler}>
      {children}
    </AdmissionSchedulerContext.Provider>
  );
};
