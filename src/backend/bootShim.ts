// Some cartridge exporters append this line, which relies on the single-line `if` form.
// It is rewritten to a regular `if ... then ... end`. The leading newline keeps the injected
// `if` from fusing with a preceding `end` into `endif`.
export const kBootShimInvalid = "if(_update60)_update=function()";
export const kBootShimValid = "\nif(_update60)then _update=function()";
export const kBootShimClosing = " end";

export type BootShimResult = {
  code: string;
  applied: boolean;
};

export function applyBootShim(code: string): BootShimResult {
  const index = code.indexOf(kBootShimInvalid);
  if (index < 0) {
    return { code, applied: false };
  }
  const patched =
    code.slice(0, index) + kBootShimValid + code.slice(index + kBootShimInvalid.length) + kBootShimClosing;
  return { code: patched, applied: true };
}
