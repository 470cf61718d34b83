import fs from "fs";
import path from "path";
import { SERVER_VERSION } from "../../src/version.js";
import { USER_AGENT } from "../../src/tools/fetch-url.js";

describe("server version", () => {
  it("matches the package version", () => {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, "../../package.json"), "utf-8"));
    expect(pkg).toMatchObject({ version: SERVER_VERSION });
  });

  it("is carried in the fetch user agent", () => {
    expect(USER_AGENT).toBe(`terminal-mcp-server/${SERVER_VERSION}`);
  });
});
