/**
 * useCountdownDisplay Hook
 *
 * Subscribes to the scheduler's countdown events and exposes what a warning
 * overlay needs to render.
 *
 * Usage:
 * ```typescript
 * import { useCountdownDisplay } from '@/hooks/useCountdownDisplay';
 *
 * function CountdownOverlay() {
 *   const { isCounting, remainingSec } = useCountdownDisplay({
 *     onEnded: (outcome) => console.log('Countdown ended:', outcome),
 *   });
 *
 *   if (!isCounting) return null;
 *   return <div className="overlay">Break in {remainingSec}...</div>;
 * }
 * ```
 */

import { useEffect, useRef, useState } from 'react';
import type { CountdownOutcome } from '@/src/admission/countdownController';
import { useAdmissionScheduler } from '@/src/contexts/AdmissionSchedulerProvider';

/**
 * Hook options
 */
export interface UseCountdownDisplayOptions {
  /** Fired once per countdown, when it completes or is cancelled */
  onEnded?: (outcome: CountdownOutcome) => void;
}

export interface CountdownDisplay {
  /** Whether a warning countdown is running */
  isCounting: boolean;

  /** Whole seconds left (null when not counting) */
  remainingSec: number | null;
}

export function useCountdownDisplay(options: UseCountdownDisplayOptions = {}): CountdownDisplay {
  const scheduler = useAdmissionScheduler();
  const [display, setDisplay] = useState<CountdownDisplay>(() => {
    const snapshot = scheduler.getSnapshot();
    return { isCounting: snapshot.isWaiting, remainingSec: snapshot.countdownRemainingSec };
  });

  // Latest callback without resubscribing on every render
  const onEndedRef = useRef(options.onEnded);
  onEndedRef.current = options.onEnded;

  useEffect(() => {
    const offStarted = scheduler.on('countdownStarted', ({ remainingSec }) => {
      setDisplay({ isCounting: true, remainingSec });
    });
    const offTick = scheduler.on('countdownTick', ({ remainingSec }) => {
      setDisplay({ isCounting: true, remainingSec });
    });
    const offEnded = scheduler.on('countdownEnded', ({ outcome }) => {
      setDisplay({ isCounting: false, remainingSec: null });
      onEndedRef.current?.(outcome);
    });

    return () => {
      offStarted();
      offTick();
      offEnded();
    };
  }, [scheduler]);

  return display;
}
