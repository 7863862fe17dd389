import assert from 'node:assert/strict';
import test from 'node:test';
import { formatLegacyColor, isTransparent, parseColor, sameColor, toRgba } from '../src/io/colors.ts';

test('parseColor normalizes hex, names and the transparent keyword', () => {
    assert.equal(parseColor('#FF8800'), 'ff8800');
    assert.equal(parseColor('Red'), 'ff0000');
    assert.equal(parseColor('Transparent'), '00000000');
    assert.equal(parseColor('ffffff80'), 'ffffff80');
});

test('parseColor drops an opaque alpha channel', () => {
    assert.equal(parseColor('123456ff'), '123456');
});

test('parseColor returns null for text that is not a color', () => {
    assert.equal(parseColor('zzz'), null);
    assert.equal(parseColor('12345'), null);
    assert.equal(parseColor(''), null);
});

test('toRgba reads the alpha channel or assumes opaque', () => {
    assert.deepEqual(toRgba('ff000080'), { r: 255, g: 0, b: 0, a: 128 });
    assert.deepEqual(toRgba('00ff00'), { r: 0, g: 255, b: 0, a: 255 });
});

test('all fully transparent colors are equal', () => {
    assert.equal(isTransparent('ffffff00'), true);
    assert.equal(sameColor('ffffff00', '00000000'), true);
    assert.equal(sameColor('ffffff', 'fffffe'), false);
});

test('formatLegacyColor has no partial alpha', () => {
    assert.equal(formatLegacyColor('00000000'), 'Transparent');
    assert.equal(formatLegacyColor('ffffff80'), 'ffffff');
    assert.equal(formatLegacyColor('abcdef'), 'abcdef');
});
