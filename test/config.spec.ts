import { expect } from "chai";
import { DEFAULT_FACTORY_ADDRESS, loadConfig } from "../contracts/config";

describe("Configuration", function () {
  it("Should fall back to defaults", function () {
    expect(loadConfig({})).to.deep.equal({ logLevel: "info", factoryAddress: DEFAULT_FACTORY_ADDRESS });
  });

  it("Should checksum the configured factory address", function () {
    const config = loadConfig({ LOG_LEVEL: "silent", FACTORY_ADDRESS: DEFAULT_FACTORY_ADDRESS.toLowerCase() });
    expect(config).to.deep.equal({ logLevel: "silent", factoryAddress: DEFAULT_FACTORY_ADDRESS });
  });

  it("Should reject malformed values", function () {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).to.throw(Error, "Invalid configuration: LOG_LEVEL");
    expect(() => loadConfig({ FACTORY_ADDRESS: "0x1234" })).to.throw(
      Error,
      "FACTORY_ADDRESS: FACTORY_ADDRESS must be a hex address"
    );
  });
});
