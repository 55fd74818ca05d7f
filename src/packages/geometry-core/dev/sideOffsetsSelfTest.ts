import { add, horizontal, newSideOffsets, newSideOffsetsAllSame, vertical, formatSideOffsets } from "../sideOffsets";

function assertEqual(label: string, actual: number | string, expected: number | string) {
    if (actual !== expected) {
        throw new Error(`sideOffsets self-test failed (${label}): ${actual} !== ${expected}`);
    }
}

export function runSideOffsetsSelfTest() {
    const box = newSideOffsets(10, 20, 30, 40);

    assertEqual("box.horizontal", horizontal(box), 60);
    assertEqual("box.vertical", vertical(box), 40);
    assertEqual("box + 1", formatSideOffsets(add(box, newSideOffsetsAllSame(1))), "(11,21,31,41)");

    const same = newSideOffsetsAllSame(5);
    assertEqual("same", formatSideOffsets(same), "(5,5,5,5)");
    assertEqual("same.horizontal", horizontal(same), 10);
}
