/** 依序釋放資源，前一個完成後才釋放下一個 */
export async function dispose(...targets: AsyncDisposable[]) {
  for (const target of targets) {
    await target[Symbol.asyncDispose]();
  }
}
