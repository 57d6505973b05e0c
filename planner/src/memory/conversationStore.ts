import crypto from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

import pLimit, { type LimitFunction } from "p-limit";
import type { Logger } from "pino";
import { z } from "zod";

import { ConflictError, InvalidInputError, InvalidScopeError, StorageError, errorMessage, isErrnoCode } from "../errors.js";
import type { Project, Role, Turn } from "../retrieval/types.js";

const MAX_PROJECT_NAME = 60;
const MAX_USER_ID = 200;

const TurnSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  projectId: z.string().min(1),
  role: z.enum(["user", "assistant"]),
  text: z.string(),
  createdAt: z.number()
});

const ProjectSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  name: z.string().min(1),
  createdAt: z.number(),
  updatedAt: z.number(),
  turnCount: z.number().int().min(0)
});

type ProjectsFile = {
  version: 1;
  projects: Project[];
};

type ConversationFile = {
  version: 1;
  projectId: string;
  turns: Turn[];
};

/** Receives store changes. Called after the change is persisted. */
export interface ConversationListener {
  turnAppended(turn: Turn): void;
  projectDeleted(userId: string, projectId: string): void;
  // Every turn of the project created at or before `upTo` is gone.
  turnsCleared(userId: string, projectId: string, upTo: number): void;
}

/**
 * Canonical form of a nickname, also used as a directory name. Letters of any
 * script, digits and "-" are kept; any other character becomes "_<hex>_" with
 * its code point, so distinct nicknames never share a directory.
 */
export function normalizeUserId(userId: string): string {
  const trimmed = userId.trim();
  if (!trimmed) return "";
  return trimmed.replace(/[^\p{L}\p{N}-]/gu, (ch) => `_${(ch.codePointAt(0) ?? 0).toString(16)}_`);
}

function normalizeProjectName(name: string): string {
  const trimmed = name.replace(/\s+/g, " ").trim();
  if (!trimmed) throw new InvalidInputError("Project name is required");
  if ([...trimmed].length > MAX_PROJECT_NAME) {
    throw new InvalidInputError(`Project name must be at most ${MAX_PROJECT_NAME} characters`);
  }
  return trimmed;
}

/**
 * Append-only conversation log per (user, project), stored as JSON files:
 * `<dataDir>/<user>/projects.json` and `<dataDir>/<user>/<projectId>.json`.
 * Writes for one user run one at a time.
 */
export class ConversationStore {
  private readonly dataDir: string;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly listeners: ConversationListener[] = [];
  private readonly queues = new Map<string, LimitFunction>();
  private lastTimestamp = 0;

  constructor(params: { dataDir: string; logger: Logger; now?: () => number }) {
    this.dataDir = params.dataDir;
    this.logger = params.logger.child({ component: "conversation-store" });
    this.now = params.now ?? Date.now;
  }

  addListener(listener: ConversationListener): void {
    this.listeners.push(listener);
  }

  async createProject(userId: string, name: string): Promise<Project> {
    const user = this.requireUser(userId);
    const projectName = normalizeProjectName(name);
    return this.exclusive(user, async () => {
      const projects = await this.readProjects(user);
      if (projects.some((p) => p.name.toLowerCase() === projectName.toLowerCase())) {
        throw new ConflictError(`Project "${projectName}" already exists`);
      }
      const at = this.nextTimestamp();
      const project: Project = {
        id: crypto.randomUUID(),
        userId: user,
        name: projectName,
        createdAt: at,
        updatedAt: at,
        turnCount: 0
      };
      await this.writeProjects(user, [...projects, project]);
      this.logger.info({ userId: user, projectId: project.id }, "Created project");
      return project;
    });
  }

  /** Most recently active first. */
  async listProjects(userId: string): Promise<Project[]> {
    const user = this.requireUser(userId);
    const projects = await this.readProjects(user);
    return projects.sort((a, b) => b.updatedAt - a.updatedAt || b.createdAt - a.createdAt);
  }

  async getProject(userId: string, projectId: string): Promise<Project | undefined> {
    const user = normalizeUserId(userId);
    if (!user) return undefined;
    const projects = await this.readProjects(user);
    return projects.find((p) => p.id === projectId);
  }

  async renameProject(userId: string, projectId: string, name: string): Promise<Project> {
    const user = this.requireUser(userId);
    const projectName = normalizeProjectName(name);
    return this.exclusive(user, async () => {
      const projects = await this.readProjects(user);
      const project = projects.find((p) => p.id === projectId);
      if (!project) throw this.scopeError(user, projectId);
      const clash = projects.some(
        (p) => p.id !== projectId && p.name.toLowerCase() === projectName.toLowerCase()
      );
      if (clash) throw new ConflictError(`Project "${projectName}" already exists`);

      const renamed: Project = { ...project, name: projectName, updatedAt: this.nextTimestamp() };
      await this.writeProjects(
        user,
        projects.map((p) => (p.id === projectId ? renamed : p))
      );
      return renamed;
    });
  }

  /**
   * Remove a project and its turns. Listeners evict the project from the
   * indexes before this resolves. The project is gone once projects.json is
   * written; a conversation file that cannot be removed after that is left
   * orphaned and reported as a StorageError.
   */
  async deleteProject(userId: string, projectId: string): Promise<void> {
    const user = this.requireUser(userId);
    await this.exclusive(user, async () => {
      const projects = await this.readProjects(user);
      if (!projects.some((p) => p.id === projectId)) throw this.scopeError(user, projectId);

      await this.writeProjects(
        user,
        projects.filter((p) => p.id !== projectId)
      );
      for (const listener of this.listeners) listener.projectDeleted(user, projectId);
      this.logger.info({ userId: user, projectId }, "Deleted project");

      try {
        await fs.rm(this.conversationPath(user, projectId), { force: true });
      } catch (err: unknown) {
        this.logger.error({ userId: user, projectId, err: errorMessage(err) }, "Left orphaned conversation file");
        throw new StorageError(`Failed to remove conversation file: ${errorMessage(err)}`, { cause: err });
      }
    });
  }

  /**
   * Drop every turn of a project but keep the project itself. Listeners evict
   * the dropped turns from the indexes before this resolves.
   */
  async clearTurns(userId: string, projectId: string): Promise<Project> {
    const user = this.requireUser(userId);
    return this.exclusive(user, async () => {
      const projects = await this.readProjects(user);
      const project = projects.find((p) => p.id === projectId);
      if (!project) throw this.scopeError(user, projectId);

      const turns = await this.readTurns(user, projectId);
      // Every stored turn is at or before this; every later turn is after it.
      const upTo = Math.max(this.nextTimestamp(), ...turns.map((t) => t.createdAt));
      this.lastTimestamp = upTo;
      await this.writeTurns(user, projectId, []);
      for (const listener of this.listeners) listener.turnsCleared(user, projectId, upTo);

      const cleared: Project = { ...project, turnCount: 0, updatedAt: upTo };
      await this.writeProjects(
        user,
        projects.map((p) => (p.id === projectId ? cleared : p))
      );
      this.logger.info({ userId: user, projectId, removed: project.turnCount }, "Cleared conversation");
      return cleared;
    });
  }

  async appendTurn(userId: string, projectId: string, role: Role, text: string): Promise<Turn> {
    const user = this.requireUser(userId);
    if (text.trim().length === 0) throw new InvalidInputError("Turn text is required");

    return this.exclusive(user, async () => {
      const projects = await this.readProjects(user);
      const project = projects.find((p) => p.id === projectId);
      if (!project) throw this.scopeError(user, projectId);

      const turns = await this.readTurns(user, projectId);
      const created: Turn = {
        id: crypto.randomUUID(),
        userId: user,
        projectId,
        role,
        text,
        createdAt: this.nextTimestamp()
      };
      await this.writeTurns(user, projectId, [...turns, created]);
      try {
        await this.writeProjects(
          user,
          projects.map((p) =>
            p.id === projectId ? { ...p, turnCount: turns.length + 1, updatedAt: created.createdAt } : p
          )
        );
      } catch (err: unknown) {
        await this.rollbackAppend(created, turns);
        throw err;
      }
      for (const listener of this.listeners) listener.turnAppended(created);
      return created;
    });
  }

  /** Chronological. */
  async listTurns(userId: string, projectId: string): Promise<Turn[]> {
    const user = this.requireUser(userId);
    const project = await this.getProject(user, projectId);
    if (!project) throw this.scopeError(user, projectId);
    const turns = await this.readTurns(user, projectId);
    return turns.sort((a, b) => a.createdAt - b.createdAt);
  }

  /** True when any project other than `projectId` holds at least one turn. */
  async hasTurnsOutside(userId: string, projectId: string): Promise<boolean> {
    const user = this.requireUser(userId);
    const projects = await this.readProjects(user);
    return projects.some((p) => p.id !== projectId && p.turnCount > 0);
  }

  async listUsers(): Promise<string[]> {
    let names: string[];
    try {
      const dirents = await fs.readdir(this.dataDir, { withFileTypes: true });
      names = dirents.filter((d) => d.isDirectory()).map((d) => d.name);
    } catch (err: unknown) {
      if (isErrnoCode(err, "ENOENT")) return [];
      throw new StorageError(`Failed to list users: ${errorMessage(err)}`, { cause: err });
    }
    return names.sort();
  }

  // A turn that cannot be taken back out of storage is still indexed, so
  // search never misses a stored turn.
  private async rollbackAppend(turn: Turn, previous: Turn[]): Promise<void> {
    try {
      await this.writeTurns(turn.userId, turn.projectId, previous);
      this.logger.warn({ userId: turn.userId, projectId: turn.projectId }, "Rolled back turn after failed project update");
    } catch (err: unknown) {
      this.logger.error(
        { userId: turn.userId, projectId: turn.projectId, turnId: turn.id, err: errorMessage(err) },
        "Rollback failed; keeping stored turn"
      );
      for (const listener of this.listeners) listener.turnAppended(turn);
    }
  }

  private requireUser(userId: string): string {
    const user = normalizeUserId(userId);
    if (!user) throw new InvalidInputError("User id is required");
    if (user.length > MAX_USER_ID) {
      throw new InvalidInputError(`User id must be at most ${MAX_USER_ID} characters once normalized`);
    }
    return user;
  }

  private scopeError(userId: string, projectId: string): InvalidScopeError {
    return new InvalidScopeError(`Project ${projectId} does not belong to user ${userId}`);
  }

  private exclusive<T>(userId: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(userId);
    if (!queue) {
      queue = pLimit(1);
      this.queues.set(userId, queue);
    }
    return queue(task);
  }

  // Strictly increasing so turns written back to back never share a timestamp.
  private nextTimestamp(): number {
    const at = Math.max(this.now(), this.lastTimestamp + 1);
    this.lastTimestamp = at;
    return at;
  }

  private userDir(userId: string): string {
    return path.join(this.dataDir, userId);
  }

  private projectsPath(userId: string): string {
    return path.join(this.userDir(userId), "projects.json");
  }

  private conversationPath(userId: string, projectId: string): string {
    return path.join(this.userDir(userId), `${projectId}.json`);
  }

  private async readProjects(userId: string): Promise<Project[]> {
    const parsed = await this.readJson(this.projectsPath(userId));
    if (parsed == null) return [];
    const raw = "projects" in parsed ? parsed.projects : undefined;
    if (!Array.isArray(raw)) {
      throw new StorageError(`Malformed projects file for user ${userId}`);
    }
    return raw.flatMap((p: unknown): Project[] => {
      const result = ProjectSchema.safeParse(p);
      if (result.success) return [result.data];
      this.logger.warn({ userId }, "Skipped malformed project record");
      return [];
    });
  }

  private async readTurns(userId: string, projectId: string): Promise<Turn[]> {
    const parsed = await this.readJson(this.conversationPath(userId, projectId));
    if (parsed == null) return [];
    const raw = "turns" in parsed ? parsed.turns : undefined;
    if (!Array.isArray(raw)) {
      throw new StorageError(`Malformed conversation file for project ${projectId}`);
    }
    return raw.flatMap((t: unknown): Turn[] => {
      const result = TurnSchema.safeParse(t);
      if (result.success && result.data.projectId === projectId) return [result.data];
      this.logger.warn({ userId, projectId }, "Skipped malformed turn record");
      return [];
    });
  }

  private async writeProjects(userId: string, projects: Project[]): Promise<void> {
    const file: ProjectsFile = { version: 1, projects };
    await this.writeJson(this.projectsPath(userId), file);
  }

  private async writeTurns(userId: string, projectId: string, turns: Turn[]): Promise<void> {
    const file: ConversationFile = { version: 1, projectId, turns };
    await this.writeJson(this.conversationPath(userId, projectId), file);
  }

  private async readJson(filePath: string): Promise<object | null> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (err: unknown) {
      if (isErrnoCode(err, "ENOENT")) return null;
      throw new StorageError(`Failed to read ${filePath}: ${errorMessage(err)}`, { cause: err });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err: unknown) {
      throw new StorageError(`Malformed JSON in ${filePath}`, { cause: err });
    }
    if (parsed === null || typeof parsed !== "object") {
      throw new StorageError(`Malformed JSON in ${filePath}`);
    }
    return parsed;
  }

  private async writeJson(filePath: string, value: unknown): Promise<void> {
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(value), "utf-8");
      await fs.rename(tmpPath, filePath);
    } catch (err: unknown) {
      throw new StorageError(`Failed to write ${filePath}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
