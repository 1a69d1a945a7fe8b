import type pino from "pino";
import type { z } from "zod";
import { NotFoundError } from "../errors";
import type { Simulator } from "../repositories/tables";
import type { DataStore } from "../repositories/types";
import { parseInput, SimulatorInputSchema } from "../validators";
import { assertUnique, requireRecord } from "./guards";

const SimulatorPatchSchema = SimulatorInputSchema.partial();

/**
 * Registry of simulation backends. Names and addresses are each unique.
 */
export class SimulatorService {
  private logger: pino.Logger;

  constructor(
    private store: DataStore,
    logger: pino.Logger
  ) {
    this.logger = logger.child({ component: "SimulatorService" });
  }

  async register(input: z.input<typeof SimulatorInputSchema>): Promise<Simulator> {
    const data = parseInput(SimulatorInputSchema, input);
    return this.store.transaction(async (tx) => {
      await assertUnique(tx.simulators, { name: data.name });
      await assertUnique(tx.simulators, { address: data.address });
      const simulator = await tx.simulators.create(data);
      this.logger.info({ simulatorId: simulator.id, name: simulator.name, address: simulator.address }, "Simulator registered");
      return simulator;
    });
  }

  async get(simulatorId: number): Promise<Simulator> {
    return requireRecord(this.store.simulators, simulatorId);
  }

  async getByName(name: string): Promise<Simulator | null> {
    return this.store.simulators.findOne({ name });
  }

  async list(): Promise<Simulator[]> {
    return this.store.simulators.findMany();
  }

  async update(simulatorId: number, patch: z.input<typeof SimulatorPatchSchema>): Promise<Simulator> {
    const data = parseInput(SimulatorPatchSchema, patch);
    return this.store.transaction(async (tx) => {
      await requireRecord(tx.simulators, simulatorId);
      if (data.name !== undefined) {
        await assertUnique(tx.simulators, { name: data.name }, simulatorId);
      }
      if (data.address !== undefined) {
        await assertUnique(tx.simulators, { address: data.address }, simulatorId);
      }
      const simulator = await tx.simulators.update(simulatorId, data);
      this.logger.info({ simulatorId, ...data }, "Simulator updated");
      return simulator;
    });
  }

  async remove(simulatorId: number): Promise<void> {
    const deleted = await this.store.simulators.delete(simulatorId);
    if (!deleted) {
      throw new NotFoundError("Simulator", simulatorId);
    }
    this.logger.info({ simulatorId }, "Simulator removed");
  }
}
