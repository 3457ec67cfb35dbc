/**
 * Whether SIGINT/SIGTERM cancel the current run. Test processes leave
 * signals to the test runner.
 */
export type ProcessLifecyclePolicy =
  | { readonly kind: 'cancel_run_on_signal' }
  | { readonly kind: 'leave_signals_alone' };
