import {
    createCharacterProfileService,
    loadContentPacks,
    loadEnvConfig,
    makeSeededRng,
} from "../src/index";

async function main() {
    const name = process.argv[2] ?? "Drifter";
    const ageArg = process.argv[3];
    const age = ageArg === undefined ? 20 : Number(ageArg);

    const config = loadEnvConfig();
    const packs = await loadContentPacks(config.contentDir);
    const service = createCharacterProfileService({ skills: packs.skills, items: packs.items });
    const rng = makeSeededRng(config.rngSeed);

    const created = service.create({ name }, rng);
    if (created.isErr()) {
        console.error(`Could not create character: ${created.error.message}`);
        process.exitCode = 1;
        return;
    }
    const character = created.value;

    const aged = service.applyAge(character, age, rng);
    if (aged.isErr()) {
        console.error(`Could not apply age: ${aged.error.message}`);
        process.exitCode = 1;
        return;
    }

    const report = aged.value;
    console.log(`${character.name}, ${report.entry.category} (${age})`);
    console.log(
        `Vigor ${character.attributes.vigor} | Finesse ${character.attributes.finesse} | Smarts ${character.attributes.smarts}`,
    );
    for (const boost of report.boosts) {
        console.log(
            boost.change
                ? `  Boost ${boost.index}: ${boost.change.attribute} ${boost.change.from} -> ${boost.change.to}`
                : `  Boost ${boost.index}: wasted`,
        );
    }
    for (const test of report.vigorTests) {
        const outcome = test.passed
            ? "passed"
            : test.loss
              ? `failed, ${test.loss.attribute} ${test.loss.from} -> ${test.loss.to}`
              : "failed, loss absorbed";
        console.log(`  Vigor test ${test.index} [${test.dice.join(", ")}]: ${outcome}`);
    }
    console.log(
        `HP ${character.derived.maxHitPoints} | Movement ${character.derived.movement} | Slots ${character.derived.baseInventorySlots}`,
    );
    console.log(`$${character.dollars} | ${character.skillPoints} skill points to spend`);
}

main().catch((error: unknown) => {
    console.error("Roll failed:", error);
    process.exitCode = 1;
});
