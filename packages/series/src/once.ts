type OnceState<T> =
  | { status: 'pending' }
  | { status: 'resolved'; value: T }
  | { status: 'failed'; error: unknown };

type Settled<T> = Exclude<OnceState<T>, { status: 'pending' }>;

/**
 * Lazily computed value.
 *
 * The compute function runs on the first `get()`. Its result, or the error it
 * threw, is cached and replayed on every later call.
 */
export class Once<T> {
  private state: OnceState<T> = { status: 'pending' };

  constructor(private readonly compute: () => T) {}

  private run(): Settled<T> {
    try {
      return { status: 'resolved', value: this.compute() };
    } catch (error) {
      return { status: 'failed', error };
    }
  }

  get(): T {
    const state = this.state.status === 'pending' ? this.run() : this.state;
    this.state = state;
    if (state.status === 'failed') {
      throw state.error;
    }
    return state.value;
  }

  get settled(): boolean {
    return this.state.status !== 'pending';
  }
}
