import type { AIProvider, ImageRequest, StructuredRequest } from "../../openai";

type Scripted<T> = T | Error;

/**
 * Scripted AIProvider. Each label ("queries", "description") plays its queue
 * in order and then repeats the fallback.
 */
export class FakeAIProvider implements AIProvider {
    structuredCalls: StructuredRequest[] = [];
    imageCalls: ImageRequest[] = [];

    private scripts = new Map<string, Array<Scripted<unknown>>>();
    private fallbacks = new Map<string, Scripted<unknown>>([
        ["queries", { queries: ['genre:"dream pop"', 'year:1994 genre:"shoegaze"'] }],
        ["description", { description: "New sounds picked from last week's listening." }],
    ]);
    private images: Array<Scripted<Buffer>> = [];
    private imageFallback: Scripted<Buffer> = new Error("No image scripted");

    script(label: string, ...responses: Array<Scripted<unknown>>): this {
        this.scripts.set(label, [...(this.scripts.get(label) ?? []), ...responses]);
        return this;
    }

    always(label: string, response: Scripted<unknown>): this {
        this.fallbacks.set(label, response);
        return this;
    }

    scriptImage(...responses: Array<Scripted<Buffer>>): this {
        this.images.push(...responses);
        return this;
    }

    alwaysImage(response: Scripted<Buffer>): this {
        this.imageFallback = response;
        return this;
    }

    callsFor(label: string): StructuredRequest[] {
        return this.structuredCalls.filter((call) => call.label === label);
    }

    async completeStructured(request: StructuredRequest): Promise<unknown> {
        this.structuredCalls.push(request);
        const next = this.scripts.get(request.label)?.shift() ?? this.fallbacks.get(request.label);
        if (next instanceof Error) throw next;
        return next;
    }

    async generateImage(request: ImageRequest): Promise<Buffer> {
        this.imageCalls.push(request);
        const next = this.images.shift() ?? this.imageFallback;
        if (next instanceof Error) throw next;
        return next;
    }
}
