/**
 * Outcome of a single store call. Driver exceptions never cross this boundary;
 * they arrive as `store-error` with the original error as detail.
 */
export type StoreResult<T> =
    | { detail: Error; status: 'store-error' }
    | { status: 'edit-conflict' }
    | { status: 'not-found' }
    | { status: 'ok'; value: T };

export const ok = <T>(value: T): StoreResult<T> => ({ status: 'ok', value });

export const notFound = <T>(): StoreResult<T> => ({ status: 'not-found' });

export const editConflict = <T>(): StoreResult<T> => ({ status: 'edit-conflict' });

export const storeError = <T>(error: unknown): StoreResult<T> => ({
    detail: error instanceof Error ? error : new Error(String(error)),
    status: 'store-error',
});

/**
 * Transform the value of an `ok` result; a throwing mapper becomes `store-error`
 */
export const mapStoreResult = <T, U>(
    result: StoreResult<T>,
    map: (value: T) => U,
): StoreResult<U> => {
    if (result.status !== 'ok') return result;

    try {
        return ok(map(result.value));
    } catch (error) {
        return storeError(error);
    }
};
