import { clearToasts, dismissToast, getToasts, showToast, subscribe } from '../toast';

describe('toast queue', () => {
  beforeEach(() => {
    jest.useFakeTimers();
    clearToasts();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('queues toasts and notifies subscribers', () => {
    const listener = jest.fn();
    const unsubscribe = subscribe(listener);

    showToast('Unknown vehicle: Z');
    showToast('Check the horizon', 'warning');

    expect(getToasts().map(t => [t.message, t.type])).toEqual([
      ['Unknown vehicle: Z', 'error'],
      ['Check the horizon', 'warning'],
    ]);
    expect(listener).toHaveBeenCalledTimes(2);
    unsubscribe();
  });

  it('removes a toast after its display time', () => {
    showToast('expires');
    expect(getToasts()).toHaveLength(1);
    jest.advanceTimersByTime(4000);
    expect(getToasts()).toHaveLength(0);
  });

  it('dismisses a toast by id', () => {
    const id = showToast('dismiss me', 'info');
    const snapshot = getToasts();
    dismissToast(id);
    expect(getToasts()).toHaveLength(0);
    expect(snapshot).toHaveLength(1);
  });
});
