import { Command, Option } from "clipanion";
import * as t from "typanion";
import { getProfilesDir, getStateDir } from "../../config/paths.js";
import { describeIssues } from "../../config/loader.js";
import { ProfileStore, defaultProfile } from "../../profile/store.js";
import { redlineRuleSchema } from "../../profile/schema.js";
import { errorMessage } from "../../utils/errors.js";

const isMatchKind = t.isEnum(["keyword", "regex", "pattern"]);

export class ProfileInitCommand extends Command {
  static override paths = [["profile", "init"]];

  static override usage = Command.Usage({
    description: "Write a starter personality profile with the default moods and redlines",
    examples: [
      ["Create the default profile", "twin profile init"],
      ["Create a named profile", "twin profile init work --display-name \"Sam at work\""],
    ],
  });

  id = Option.String({ name: "id", required: false });

  displayName = Option.String("--display-name", {
    description: "Name the twin speaks as",
    required: false,
  });

  force = Option.Boolean("--force", false, {
    description: "Overwrite an existing profile",
  });

  async execute(): Promise<void> {
    const id = this.id ?? "default";
    const store = new ProfileStore(getProfilesDir(getStateDir()));

    try {
      if (!this.force && (await store.exists(id))) {
        this.context.stdout.write(`Profile "${id}" already exists (use --force to overwrite)\n`);
        process.exitCode = 1;
        return;
      }
    } catch (err) {
      // An unreadable profile can still be replaced with --force.
      if (!this.force) {
        this.context.stdout.write(`Profile "${id}" exists but is unreadable: ${errorMessage(err)}\n`);
        process.exitCode = 1;
        return;
      }
    }

    const base = defaultProfile(id);
    const saved = await store.save(this.displayName ? { ...base, displayName: this.displayName } : base);
    this.context.stdout.write(
      `Created profile "${saved.id}" with ${Object.keys(saved.moodPresets).length} moods and ${saved.redlines.length} redlines\n`,
    );
  }
}

export class ProfileShowCommand extends Command {
  static override paths = [["profile", "show"]];

  static override usage = Command.Usage({
    description: "Print a personality profile",
    examples: [["Show the default profile", "twin profile show"]],
  });

  id = Option.String({ name: "id", required: false });

  async execute(): Promise<void> {
    const store = new ProfileStore(getProfilesDir(getStateDir()));
    try {
      const profile = await store.load(this.id ?? "default");
      this.context.stdout.write(JSON.stringify(profile, null, 2) + "\n");
    } catch (err) {
      this.context.stdout.write(`${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}

export class ProfileRedlineAddCommand extends Command {
  static override paths = [["profile", "redline", "add"]];

  static override usage = Command.Usage({
    description: "Add or replace a redline rule on a profile",
    examples: [
      ["Never mention a codename", "twin profile redline add codename bluebird"],
      ["Block card numbers", "twin profile redline add cards credit-card --kind pattern --severity critical"],
    ],
  });

  ruleId = Option.String({ name: "rule-id", required: true });

  value = Option.String({ name: "value", required: true });

  kind = Option.String("--kind", "keyword", {
    description: "keyword, regex or pattern",
  });

  severity = Option.String("--severity", "high", {
    description: "low, medium, high or critical",
  });

  category = Option.String("--category", "custom", {
    description: "Free-form grouping shown in the audit log",
  });

  profile = Option.String("--profile", "default", {
    description: "Profile to edit",
  });

  async execute(): Promise<void> {
    const kind = this.kind;
    if (!isMatchKind(kind)) {
      this.context.stdout.write(`Unknown match kind "${kind}" (expected keyword, regex or pattern)\n`);
      process.exitCode = 1;
      return;
    }
    const parsed = redlineRuleSchema.safeParse({
      id: this.ruleId,
      category: this.category,
      match: { kind, value: this.value },
      severity: this.severity,
    });
    if (!parsed.success) {
      this.context.stdout.write("Invalid redline:\n");
      for (const problem of describeIssues(parsed.error)) {
        this.context.stdout.write(`  - ${problem}\n`);
      }
      process.exitCode = 1;
      return;
    }

    const store = new ProfileStore(getProfilesDir(getStateDir()));
    try {
      const saved = await store.addRedline(this.profile, parsed.data);
      this.context.stdout.write(
        `Added redline "${parsed.data.id}" to "${saved.id}" (${saved.redlines.length} redlines)\n`,
      );
    } catch (err) {
      this.context.stdout.write(`${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}

export class ProfileRedlineRemoveCommand extends Command {
  static override paths = [["profile", "redline", "remove"]];

  static override usage = Command.Usage({
    description: "Remove a redline rule from a profile",
    examples: [["Remove a rule", "twin profile redline remove codename"]],
  });

  ruleId = Option.String({ name: "rule-id", required: true });

  profile = Option.String("--profile", "default", {
    description: "Profile to edit",
  });

  async execute(): Promise<void> {
    const store = new ProfileStore(getProfilesDir(getStateDir()));
    try {
      const current = await store.load(this.profile);
      if (!current.redlines.some((r) => r.id === this.ruleId)) {
        this.context.stdout.write(`Profile "${current.id}" has no redline "${this.ruleId}"\n`);
        process.exitCode = 1;
        return;
      }
      const saved = await store.removeRedline(this.profile, this.ruleId);
      this.context.stdout.write(
        `Removed redline "${this.ruleId}" from "${saved.id}" (${saved.redlines.length} redlines)\n`,
      );
    } catch (err) {
      this.context.stdout.write(`${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}

export class ProfileTopicAddCommand extends Command {
  static override paths = [["profile", "topic", "add"]];

  static override usage = Command.Usage({
    description: "Add a sensitive topic; in moderate mode replies mentioning it wait for approval",
    examples: [["Hold replies about rent", "twin profile topic add rent"]],
  });

  topic = Option.String({ name: "topic", required: true });

  profile = Option.String("--profile", "default", {
    description: "Profile to edit",
  });

  async execute(): Promise<void> {
    const topic = this.topic.trim();
    if (topic.length === 0) {
      this.context.stdout.write("Topic must not be empty\n");
      process.exitCode = 1;
      return;
    }

    const store = new ProfileStore(getProfilesDir(getStateDir()));
    try {
      const saved = await store.addSensitiveTopic(this.profile, topic);
      this.context.stdout.write(
        `Added sensitive topic "${topic.toLowerCase()}" to "${saved.id}" (${saved.sensitiveTopics.length} topics)\n`,
      );
    } catch (err) {
      this.context.stdout.write(`${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
