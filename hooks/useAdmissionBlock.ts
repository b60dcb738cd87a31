/**
 * useAdmissionBlock Hook
 *
 * Holds one admission block while the calling component is mounted (and
 * `active` is true). Full-screen UIs such as shops and loading screens use
 * it so block/unblock always pair up.
 */

import { useEffect } from 'react';
import { useAdmissionScheduler } from '@/src/contexts/AdmissionSchedulerProvider';

export function useAdmissionBlock(active = true): void {
  const scheduler = useAdmissionScheduler();

  useEffect(() => {
    if (!active) {
      return;
    }
    scheduler.block();
    return () => {
      scheduler.unblock();
    };
  }, [scheduler, active]);
}
