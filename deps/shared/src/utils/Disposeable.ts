export interface AsyncDisposableResource {
  [Symbol.asyncDispose](): Promise<void>;
}

/** 依序釋放資源，單一資源失敗不影響其餘資源 */
export async function dispose(...resources: AsyncDisposableResource[]) {
  const errors: unknown[] = [];
  for (const resource of resources) {
    try {
      await resource[Symbol.asyncDispose]();
    } catch (error) {
      errors.push(error);
    }
  }
  if (errors.length > 0) {
    throw new AggregateError(errors, "釋放資源時發生錯誤");
  }
}
