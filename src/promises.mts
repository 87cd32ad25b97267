export class InvertedPromise<T> {
  readonly promise: Promise<T>;
  readonly resolve: (result: T) => void;
  readonly reject: (error: unknown) => void;

  constructor() {
    let resolve: (result: T) => void = () => { };
    let reject: (error: unknown) => void = () => { };
    this.promise = new Promise<T>((res, rej) => {
      resolve = res;
      reject = rej;
    });
    this.resolve = resolve;
    this.reject = reject;
  }
}
