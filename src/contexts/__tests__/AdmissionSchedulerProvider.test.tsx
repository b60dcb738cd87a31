// @vitest-environment jsdom
import type { ReactNode } from 'react';
import { renderHook } from '@testing-library/react';
import { beforeEach, describe, expect, it } from 'vitest';
import { AdmissionScheduler } from '../../admission/admissionScheduler';
import { defaultSchedulerConfig } from '../../config/schedulerConfig';
import { AdmissionSchedulerProvider, useAdmissionScheduler } from '../AdmissionSchedulerProvider';
import { FakePlatform, MemoryCounterStore, silenceConsole } from '../../admission/__tests__/fakes';

describe('AdmissionSchedulerProvider', () => {
  beforeEach(() => {
    silenceConsole();
  });

  it('exposes the scheduler to descendants', () => {
    const scheduler = new AdmissionScheduler({
      config: defaultSchedulerConfig(),
      platform: new FakePlatform(),
      counterStore: new MemoryCounterStore(),
    });
    const wrapper = ({ children }: { children: ReactNode }) => (
      <AdmissionSchedulerProvider scheduler={scheduler}>{children}</AdmissionSchedulerProvider>
    );

    const { result } = renderHook(() => useAdmissionScheduler(), { wrapper });

    expect(result.current).toBe(scheduler);
  });

  it('throws outside the provider', () => {
    expect(() => renderHook(() => useAdmissionScheduler())).toThrow(
      'useAdmissionScheduler must be used within AdmissionSchedulerProvider'
    );
  });
});
