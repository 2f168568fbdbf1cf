import { expect } from "chai";
import * as launchPools from "../contracts";

describe("Package Exports", function () {
  it("Should expose the factory, pool and helpers", function () {
    expect(launchPools).to.have.property("LaunchPoolFactory");
    expect(launchPools).to.have.property("LaunchPool");
    expect(launchPools).to.have.property("computePoolAddress");
    expect(launchPools.NATIVE_ASSET).to.equal("0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE");
  });

  it("Should keep test doubles out of the package surface", function () {
    expect(launchPools).to.not.have.property("MockLedger");
    expect(launchPools).to.not.have.property("MockClock");
  });
});
