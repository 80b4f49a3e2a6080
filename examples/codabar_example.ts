import { createBarcode, defaultFilename, describeBarcode, parseSymbology, renderBarcodeToSvg } from "../src";

const args = process.argv.slice(2);
const verbose = args.includes("--verbose");
const [value = "1234", type = "codabar"] = args.filter((arg) => arg !== "--verbose");

const symbology = parseSymbology(type);
if (verbose) {
  process.stderr.write(`Generating a ${symbology} barcode from the value: ${value}\n`);
}

const barcode = createBarcode(value, symbology);
const svg = renderBarcodeToSvg(barcode, {
  moduleWidth: 2,
  height: 80,
  quietZone: 10,
  fontSize: 14,
});

// Print to stdout so it can be redirected to a file
process.stdout.write(svg);

if (verbose) {
  process.stderr.write(`\nSuggested file name: ${defaultFilename(describeBarcode(barcode), "svg")}\n`);
}
