import { AnnouncementService } from '../../../src/application/AnnouncementService';
import { SourceRegistry } from '../../../src/application/SourceRegistry';
import { FakeExtractor, notice } from '../../helpers/fakes';

describe('AnnouncementService', () => {
    test('lists the registered universities', () => {
        const service = new AnnouncementService(new SourceRegistry([
            new FakeExtractor('Bangalore'),
            new FakeExtractor('Goa'),
            new FakeExtractor('Mumbai'),
        ]));

        expect(service.listUniversities()).toEqual(['Bangalore', 'Goa', 'Mumbai']);
    });

    describe('collectAll', () => {
        test('keeps source order even when later sources answer first', async () => {
            const service = new AnnouncementService(new SourceRegistry([
                new FakeExtractor('Bangalore', [notice('Bangalore', 'B1'), notice('Bangalore', 'B2')], 40),
                new FakeExtractor('Goa', [notice('Goa', 'G1')], 20),
                new FakeExtractor('Mumbai', [notice('Mumbai', 'M1')], 0),
            ]));

            const announcements = await service.collectAll();

            expect(announcements.map((a) => a.title)).toEqual(['B1', 'B2', 'G1', 'M1']);
        });

        test('runs the sources concurrently', async () => {
            const started: string[] = [];
            const extractors = [
                new FakeExtractor('Bangalore', [], 30),
                new FakeExtractor('Goa', [], 30),
                new FakeExtractor('Mumbai', [], 30),
            ];
            for (const extractor of extractors) {
                const original = extractor.extract.getMockImplementation();
                extractor.extract.mockImplementation((signal) => {
                    started.push(extractor.university);
                    if (!original) throw new Error('missing implementation');
                    return original(signal);
                });
            }
            const service = new AnnouncementService(new SourceRegistry(extractors));

            const pending = service.collectAll();
            expect(started).toEqual(['Bangalore', 'Goa', 'Mumbai']);
            await pending;
        });

        test('skips failed sources without failing the whole collection', async () => {
            const service = new AnnouncementService(new SourceRegistry([
                new FakeExtractor('Bangalore', [notice('Bangalore', 'B1')]),
                new FakeExtractor('Goa').failWith('HTTP 500'),
                new FakeExtractor('Mumbai', [notice('Mumbai', 'M1')]),
            ]));

            const announcements = await service.collectAll();

            expect(announcements.map((a) => a.university)).toEqual(['Bangalore', 'Mumbai']);
        });

        test('passes the cancellation signal to every source', async () => {
            const extractors = [new FakeExtractor('Bangalore'), new FakeExtractor('Goa'), new FakeExtractor('Mumbai')];
            const service = new AnnouncementService(new SourceRegistry(extractors));
            const controller = new AbortController();

            await service.collectAll(controller.signal);

            for (const extractor of extractors) {
                expect(extractor.extract).toHaveBeenCalledWith(controller.signal);
            }
        });
    });

    describe('collectFrom', () => {
        test('returns one source only', async () => {
            const goa = new FakeExtractor('Goa', [notice('Goa', 'G1')]);
            const mumbai = new FakeExtractor('Mumbai', [notice('Mumbai', 'M1')]);
            const service = new AnnouncementService(new SourceRegistry([goa, mumbai]));

            const source = service.findSource('GOA');
            expect(source).toBeDefined();
            if (!source) return;

            await expect(service.collectFrom(source)).resolves.toEqual([notice('Goa', 'G1')]);
            expect(mumbai.extract).not.toHaveBeenCalled();
        });

        test('a failed fetch yields an empty list', async () => {
            const service = new AnnouncementService(new SourceRegistry([new FakeExtractor('Goa').failWith('timeout')]));
            const source = service.findSource('goa');
            if (!source) throw new Error('goa should be registered');

            await expect(service.collectFrom(source)).resolves.toEqual([]);
        });
    });
});
