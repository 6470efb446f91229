import { expect } from "chai";

import { CodegenError } from "@svcgen/codegen";

import { formatError, parseCommand } from "./bin.js";

describe("@svcgen/cli command parser", () => {
  it("classifies supported commands", () => {
    expect(parseCommand(["init"])).to.equal("init");
    expect(parseCommand(["generate"])).to.equal("generate");
    expect(parseCommand(["help"])).to.equal("help");
    expect(parseCommand(["--help"])).to.equal("help");
  });

  it("treats a missing command as help and rejects unknown ones", () => {
    expect(parseCommand([])).to.equal("help");
    expect(parseCommand(["unknown"])).to.equal(undefined);
    expect(parseCommand(["build", "generate"])).to.equal(undefined);
  });

  it("prefixes codegen errors with their code", () => {
    expect(formatError(new CodegenError("SVC3002", "Unknown binding."))).to.equal("SVC3002: Unknown binding.");
    expect(formatError(new Error("plain"))).to.equal("plain");
    expect(formatError("text")).to.equal("text");
  });
});
