/**
 * @file examples/evi.ts
 * @description Enhanced Vegetation Index computed from three band reflectances
 *              bound as parameters.
 */

import {evaluate} from "../engine.js";
import {fromArgument, fromNode, ProcessGraphBuilder} from "../graphBuilder.js";
import type {ParameterDefinition} from "../types.js";

const reflectance = (name: string, band: string): ParameterDefinition => ({
    name,
    description: `Reflectance of the ${band} band`,
    schema: {type: "number"},
    optional: false,
});

export const eviParameters: ParameterDefinition[] = [
    reflectance("nir", "near infrared"),
    reflectance("red", "red"),
    reflectance("blue", "blue"),
];

// EVI = 2.5 * (NIR - RED) / (1 + NIR + 6 * RED - 7.5 * BLUE)
export const eviGraph = new ProcessGraphBuilder()
    .node("sub", "subtract", {x: fromArgument("nir"), y: fromArgument("red")})
    .node("p1", "product", {data: [6, fromArgument("red")]})
    .node("p2", "product", {data: [-7.5, fromArgument("blue")]})
    .node("sum", "sum", {data: [1, fromArgument("nir"), fromNode("p1"), fromNode("p2")]})
    .node("div", "divide", {x: fromNode("sub"), y: fromNode("sum")})
    .node("p3", "product", {data: [2.5, fromNode("div")]})
    .result("p3")
    .build();

/**
 * Evaluates the EVI graph for one pixel.
 */
export async function computeEvi(nir: number, red: number, blue: number): Promise<number> {
    const outcome = await evaluate(eviGraph, {nir, red, blue}, {declarations: eviParameters});
    if (!outcome.ok) {
        throw outcome.error;
    }
    if (typeof outcome.value !== "number") {
        throw new TypeError(`EVI evaluated to a non-numeric value: ${JSON.stringify(outcome.value)}`);
    }
    return outcome.value;
}
