import { describe, expect, it, vi } from "vitest";
import { ServiceToken } from "../core/service-token.js";
import { ServiceRegistry } from "./service-registry.js";

const CLOCK = new ServiceToken<() => number>("Clock");
const NAME = new ServiceToken<string>("Name");

describe("ServiceRegistry", () => {
  it("returns null for unregistered tokens", () => {
    expect(new ServiceRegistry().getService(NAME)).toBeNull();
  });

  it("returns registered constants", () => {
    const registry = new ServiceRegistry().registerConstant(NAME, "primary");
    expect(registry.getService(NAME)).toBe("primary");
  });

  it("invokes factories on every lookup", () => {
    let next = 0;
    const factory = vi.fn(() => {
      next++;
      return `instance-${next}`;
    });
    const registry = new ServiceRegistry().register(NAME, factory);

    expect(registry.getService(NAME)).toBe("instance-1");
    expect(registry.getService(NAME)).toBe("instance-2");
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it("a later registration replaces the earlier one", () => {
    const registry = new ServiceRegistry().registerConstant(NAME, "old").registerConstant(NAME, "new");
    expect(registry.getService(NAME)).toBe("new");
  });

  it("keeps registrations separate per registry and per token", () => {
    const clock = () => 42;
    const a = new ServiceRegistry().registerConstant(CLOCK, clock);
    const b = new ServiceRegistry();

    expect(a.getService(CLOCK)).toBe(clock);
    expect(a.getService(NAME)).toBeNull();
    expect(b.getService(CLOCK)).toBeNull();
  });

  it("tokens describe themselves by name", () => {
    expect(String(NAME)).toBe("ServiceToken(Name)");
  });
});
