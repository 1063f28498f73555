/**
 * Compile-time check that an implementation carries every method of an API
 * interface with a compatible signature.
 *
 * ```typescript
 * export class InternalController implements InternalApi {
 *     private readonly __validator!: ValidateImplementation<InternalController, InternalApi>;
 * }
 * ```
 *
 * The field is never read at runtime; the `!` only silences definite assignment.
 */
export type ValidateImplementation<TImpl, TInterface> = {
    [K in keyof TInterface]: K extends keyof TImpl
        ? TImpl[K] extends TInterface[K]
            ? TInterface[K]
            : never
        : never;
};
