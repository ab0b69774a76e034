import fs from "node:fs";
import { z } from "zod";
import { roles, Approver } from "../types/contracts.js";
import { ApproverDirectory } from "./directory.js";

export const ApproverSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  name: z.string().min(1),
  role: z.enum(roles),
  organizationId: z.string().min(1).nullable().default(null),
  email: z.string().email().optional(),
  enterpriseId: z.string().min(1).optional()
});

const DirectoryFileSchema = z.array(ApproverSchema);

/**
 * Approvers loaded from a JSON array on disk. The file is read once by
 * `init()` and again on `reload()`; lookups are served from memory.
 */
export class FileDirectory implements ApproverDirectory {
  private approvers: Approver[] = [];

  constructor(private filePath: string) {}

  async init(): Promise<void> {
    await this.reload();
  }

  async reload(): Promise<void> {
    if (!fs.existsSync(this.filePath)) {
      this.approvers = [];
      return;
    }
    const raw: unknown = JSON.parse(await fs.promises.readFile(this.filePath, "utf8"));
    this.approvers = DirectoryFileSchema.parse(raw);
  }

  async listApprovers(): Promise<Approver[]> {
    return this.approvers;
  }
}
