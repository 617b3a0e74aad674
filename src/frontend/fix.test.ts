import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { fixCommand } from "./fix";

describe("fix command", () => {
  let tempDir: string;
  // `x="é"` in UTF-8, then a compound assignment
  const input = Buffer.concat([Buffer.from('x="'), Buffer.from([0xc3, 0xa9]), Buffer.from('"\nx += 1\n')]);
  const expected = Buffer.concat([Buffer.from('x="'), Buffer.from([0xc3, 0xa9]), Buffer.from('"\nx =x +( 1)\n')]);

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "cartfix-fix-"));
    jest.spyOn(process, "cwd").mockReturnValue(tempDir);
    fs.writeFileSync(path.join(tempDir, "cart.lua"), input);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should write non-ASCII bytes to stdout unchanged", async () => {
    const write = jest.spyOn(process.stdout, "write").mockImplementation(() => true);

    await fixCommand(path.join(tempDir, "cart.lua"));

    expect(write).toHaveBeenCalledTimes(1);
    const [chunk, encoding] = write.mock.calls[0];
    expect(encoding).toBe("latin1");
    expect(typeof chunk).toBe("string");
    if (typeof chunk === "string") {
      expect(Buffer.from(chunk, "latin1")).toEqual(expected);
    }
  });

  it("should write non-ASCII bytes to the output file unchanged", async () => {
    const outputPath = path.join(tempDir, "out", "cart.lua");

    await fixCommand(path.join(tempDir, "cart.lua"), { output: outputPath });

    expect(fs.readFileSync(outputPath)).toEqual(expected);
  });

  it("should set a failing exit code on a syntax error", async () => {
    fs.writeFileSync(path.join(tempDir, "broken.lua"), "x = 1\nend");
    const write = jest.spyOn(process.stdout, "write").mockImplementation(() => true);

    await fixCommand(path.join(tempDir, "broken.lua"));

    expect(process.exitCode).toBe(1);
    expect(write).not.toHaveBeenCalled();
  });
});
