// @vitest-environment jsdom
import type { ReactNode } from 'react';
import { renderHook } from '@testing-library/react';
import { beforeEach, describe, expect, it } from 'vitest';
import { AdmissionScheduler } from '@/src/admission/admissionScheduler';
import { defaultSchedulerConfig } from '@/src/config/schedulerConfig';
import { AdmissionSchedulerProvider } from '@/src/contexts/AdmissionSchedulerProvider';
import { FakePlatform, MemoryCounterStore, silenceConsole } from '@/src/admission/__tests__/fakes';
import { useAdmissionBlock } from '../useAdmissionBlock';

describe('useAdmissionBlock', () => {
  let scheduler: AdmissionScheduler;

  beforeEach(() => {
    silenceConsole();
    scheduler = new AdmissionScheduler({
      config: defaultSchedulerConfig(),
      platform: new FakePlatform(),
      counterStore: new MemoryCounterStore(),
    });
  });

  const wrapper = ({ children }: { children: ReactNode }) => (
    <AdmissionSchedulerProvider scheduler={scheduler}>{children}</AdmissionSchedulerProvider>
  );

  it('holds a block while mounted', () => {
    const { unmount } = renderHook(() => useAdmissionBlock(), { wrapper });
    expect(scheduler.blockCount).toBe(1);

    unmount();
    expect(scheduler.blockCount).toBe(0);
  });

  it('follows the active flag', () => {
    const { rerender, unmount } = renderHook(({ active }: { active: boolean }) => useAdmissionBlock(active), {
      wrapper,
      initialProps: { active: false },
    });
    expect(scheduler.blockCount).toBe(0);

    rerender({ active: true });
    expect(scheduler.blockCount).toBe(1);

    rerender({ active: false });
    expect(scheduler.blockCount).toBe(0);

    unmount();
    expect(scheduler.blockCount).toBe(0);
  });

  it('pairs with blocks taken elsewhere', () => {
    scheduler.block();
    const { unmount } = renderHook(() => useAdmissionBlock(), { wrapper });
    expect(scheduler.blockCount).toBe(2);

    unmount();
    expect(scheduler.isAdmissionBlocked).toBe(true);
  });
});
