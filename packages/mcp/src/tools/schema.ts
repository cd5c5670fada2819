/**
 * JSON Schema for capacitor parameters, shared by the compile and validate tools.
 */

export const shapeParametersSchema = {
  type: "object" as const,
  description: "Capacitor parameters. Lengths in µm, multiples of the 0.005 µm grid.",
  properties: {
    shape: {
      type: "string" as const,
      enum: ["h", "i", "sandwich"],
      description:
        "h: shielded frame with fingers and a middle bar (odd fingerCount >= 3). " +
        "i: fingers hung alternately from two bars (even fingerCount >= 2). " +
        "sandwich: plates on the outer layers of exactly three layers, interdigitated core between (fingerCount >= 2).",
    },
    fingerCount: { type: "integer" as const, description: "Number of fingers (core fingers for sandwich)" },
    activeHeight: { type: "number" as const, description: "Height of the finger region" },
    fingerWidth: {
      type: "number" as const,
      description: "Finger width; an even number of grid units",
    },
    barWidth: {
      type: "number" as const,
      description: "Requested bar width; rounded up to widthQuantBase + n × widthQuantStep",
    },
    frameWidth: {
      type: "number" as const,
      description: "Frame width; quantized like bars for sandwich, an even number of grid units otherwise",
    },
    spacing: {
      type: "number" as const,
      description: "Gap between fingers, between finger tips and bars, and around the active region",
    },
    layers: {
      type: "array" as const,
      items: { type: "string" as const },
      description: "Metal layers, top first, e.g. [\"M7\", \"M6\", \"M5\"]",
    },
    maxHeight: { type: "number" as const, description: "Ceiling on the total height" },
    lowParasitic: {
      type: "boolean" as const,
      description: "Keep plates off the technology's low-parasitic excluded layers",
    },
    shield: { type: "boolean" as const, description: "Draw the shield frame (default: on for h only)" },
    labelHeight: { type: "number" as const, description: "Pin label height (default 0.1)" },
  },
  required: [
    "shape",
    "fingerCount",
    "activeHeight",
    "fingerWidth",
    "barWidth",
    "frameWidth",
    "spacing",
    "layers",
  ],
};
