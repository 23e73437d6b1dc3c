import { tool } from "@langchain/core/tools";
import { z } from "zod";
import { isGraphError, type NetworkOperation } from "@opgraph/core";

export interface NetworkToolParams {
    network: NetworkOperation;
    /** Validates the tool call; its keys seed the computation */
    schema: z.ZodObject;
    /** Names returned to the model; every computed value when empty */
    outputs?: string[];
    /** Defaults to the network name */
    name?: string;
    description: string;
}

/**
 * Expose a composed network as a structured tool.
 *
 * The tool returns the requested outputs as JSON text. Engine errors
 * (missing inputs, failed operations) come back as `Error: <message>` so the
 * model can correct its call; anything else propagates.
 */
export function createNetworkTool({ network, schema, outputs = [], name = network.name, description }: NetworkToolParams) {
    return tool(
        async (input) => {
            try {
                const values = await network.compute({ ...input }, outputs);
                return JSON.stringify(values);
            } catch (error) {
                if (isGraphError(error)) {
                    return `Error: ${error.message}`;
                }
                throw error;
            }
        },
        {
            name,
            description,
            schema,
        }
    );
}
