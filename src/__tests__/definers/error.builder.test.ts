import { z } from "zod";
import { r } from "../..";
import { GuardedError } from "../../definers/defineError";

describe("error builder", () => {
  it("build() returns a helper that can throw and type-narrow via is()", () => {
    const AppError = r
      .error<{ code: number; reason: string }>("tests.errors.app")
      .format(({ code, reason }) => `E${code}: ${reason}`)
      .build();
    expect.assertions(6);

    try {
      AppError.throw({ code: 123, reason: "Boom" });
    } catch (err) {
      expect(AppError.is(err)).toBe(true);
      if (AppError.is(err)) {
        expect(err.name).toBe("tests.errors.app");
        expect(err.id).toBe("tests.errors.app");
        expect(err.message).toBe("E123: Boom");
        expect(err.data).toEqual({ code: 123, reason: "Boom" });
        expect(AppError.toString(err)).toBe("E123: Boom");
      }
    }
  });

  it("validates data via dataSchema.parse before throwing", () => {
    const TypedError = r
      .error<{ code: number }>("tests.errors.typed")
      .dataSchema(z.object({ code: z.number() }))
      .build();

    const bad = JSON.parse('{"code":"x"}');
    let caught: unknown;
    try {
      TypedError.throw(bad);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(z.ZodError);
    expect(TypedError.is(caught)).toBe(false);
  });

  it("falls back to id and serialized data when no format is given", () => {
    const Plain = r.error<{ n: number }>("tests.errors.plain").build();

    expect(() => Plain.throw({ n: 1 })).toThrow('tests.errors.plain: {"n":1}');
  });

  it("appends remediation advice, static or computed", () => {
    const Static = r
      .error<{ key: string }>("tests.errors.static")
      .format(({ key }) => `Missing ${key}`)
      .remediation("Set it.")
      .build();
    const Computed = r
      .error<{ key: string }>("tests.errors.computed")
      .format(({ key }) => `Missing ${key}`)
      .remediation(({ key }) => `Export ${key}=1.`)
      .build();

    expect(() => Static.throw({ key: "A" })).toThrow(
      "Missing A\n\nRemediation: Set it.",
    );
    expect(() => Computed.throw({ key: "B" })).toThrow(
      "Missing B\n\nRemediation: Export B=1.",
    );
  });

  it("distinguishes helpers by id", () => {
    const A = r.error("tests.errors.a").build();
    const B = r.error("tests.errors.b").build();

    try {
      A.throw({});
    } catch (error) {
      expect(A.is(error)).toBe(true);
      expect(B.is(error)).toBe(false);
      expect(error).toBeInstanceOf(GuardedError);
    }
    expect(A.is(new Error("tests.errors.a"))).toBe(false);
  });

  it("exposes meta and leaves builders immutable", () => {
    const base = r.error("tests.errors.meta");
    const withMeta = base.meta({ title: "Meta" });

    expect(withMeta.build().meta).toEqual({ title: "Meta" });
    expect(base.build().meta).toEqual({});
    expect(Object.isFrozen(withMeta.build())).toBe(true);
  });
});
