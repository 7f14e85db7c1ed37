import { ALL_RULES, DEFAULT_SETTINGS, getRulePriority, getWaitSeconds, isRuleEnabled, isSlowCommand, makeSettings } from "../src/config/settings.js";

const onRule = { name: "on_rule", enabledByDefault: true, priority: 300 };
const offRule = { name: "off_rule", enabledByDefault: false, priority: 1000 };

describe("isRuleEnabled", () => {
  it("runs enabled-by-default rules under ALL", () => {
    expect(DEFAULT_SETTINGS.rules).toEqual([ALL_RULES]);
    expect(isRuleEnabled(DEFAULT_SETTINGS, onRule)).toBe(true);
    expect(isRuleEnabled(DEFAULT_SETTINGS, offRule)).toBe(false);
  });

  it("runs only listed rules under an explicit list", () => {
    const settings = makeSettings({ rules: ["off_rule"] });
    expect(isRuleEnabled(settings, offRule)).toBe(true);
    expect(isRuleEnabled(settings, onRule)).toBe(false);
  });

  it("runs opt-in rules listed next to ALL", () => {
    const settings = makeSettings({ rules: [ALL_RULES, "off_rule"] });
    expect(isRuleEnabled(settings, onRule)).toBe(true);
    expect(isRuleEnabled(settings, offRule)).toBe(true);
    expect(isRuleEnabled(settings, { name: "other_off", enabledByDefault: false })).toBe(false);
  });

  it("lets exclusion win over everything", () => {
    expect(isRuleEnabled(makeSettings({ excludeRules: ["on_rule"] }), onRule)).toBe(false);
    expect(isRuleEnabled(makeSettings({ rules: ["off_rule"], excludeRules: ["off_rule"] }), offRule)).toBe(false);
  });
});

describe("getRulePriority", () => {
  it("prefers the configured override", () => {
    expect(getRulePriority(DEFAULT_SETTINGS, onRule)).toBe(300);
    expect(getRulePriority(makeSettings({ priority: { on_rule: 5 } }), onRule)).toBe(5);
    expect(getRulePriority(makeSettings({ priority: { on_rule: 0 } }), onRule)).toBe(0);
  });
});

describe("isSlowCommand", () => {
  it("recognizes slow programs behind wrappers and paths", () => {
    for (const script of [
      "gradle build",
      "./gradlew test",
      "sudo vagrant up",
      "sudo -E gradle",
      "env JAVA_HOME=/x gradle build",
      "time lein test",
      "/opt/bin/gradle",
    ]) {
      expect(isSlowCommand(DEFAULT_SETTINGS, script)).toBe(true);
    }
  });

  it("treats everything else as fast", () => {
    expect(isSlowCommand(DEFAULT_SETTINGS, "git status")).toBe(false);
    expect(isSlowCommand(DEFAULT_SETTINGS, "")).toBe(false);
    expect(isSlowCommand(makeSettings({ slowCommands: [] }), "gradle build")).toBe(false);
  });
});

describe("getWaitSeconds", () => {
  it("picks the slow timeout for slow commands", () => {
    expect(getWaitSeconds(DEFAULT_SETTINGS, "git status")).toBe(3);
    expect(getWaitSeconds(DEFAULT_SETTINGS, "vagrant up")).toBe(15);
    expect(getWaitSeconds(makeSettings({ waitSlowCommand: 60 }), "lein run")).toBe(60);
  });
});
