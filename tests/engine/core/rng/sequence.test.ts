import { SequenceRandom } from "@/engine/core/rng/sequence";

describe("@/engine/core/rng/sequence — scripted draws", () => {
  test("yields values in order and then cycles", () => {
    let rng = new SequenceRandom([2, 0, 5]);
    const out: Array<number> = [];
    for (let i = 0; i < 7; i++) {
      const d = rng.nextInt(0, 7);
      out.push(d.value);
      expect(d.next).toBeInstanceOf(SequenceRandom);
      rng = d.next instanceof SequenceRandom ? d.next : rng;
    }
    expect(out).toEqual([2, 0, 5, 2, 0, 5, 2]);
    expect(rng.position).toBe(1);
  });

  test("drawing does not advance the source it was called on", () => {
    const rng = new SequenceRandom([1, 2]);
    expect(rng.nextInt(0, 7).value).toBe(1);
    expect(rng.nextInt(0, 7).value).toBe(1);
    expect(rng.position).toBe(0);
  });

  test("a value outside the requested range fails loudly", () => {
    const rng = new SequenceRandom([4, 9], 1);
    expect(() => rng.nextInt(0, 7)).toThrow(
      "Scripted value 9 at index 1 outside [0, 7]",
    );
  });

  test("an empty script is rejected", () => {
    expect(() => new SequenceRandom([])).toThrow("Sequence must not be empty");
  });
});
